export type { BoardStore } from "./BoardStore.js";
