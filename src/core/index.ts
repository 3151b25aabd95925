export { DebugView } from "./DebugView";
export { formatDebugInfo } from "./formatDebugInfo";
export { InputManager } from "./InputManager";
export { SimulationLogger } from "./SimulationLogger";
export type { SimulationDebugLog } from "./SimulationLogger";
