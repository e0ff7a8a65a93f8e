export type { CursorStore } from "./cursorStore";
