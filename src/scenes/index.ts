export { HexagonScene } from "./HexagonScene";
