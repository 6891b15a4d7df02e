/**
 * Board package - a file-backed kanban board.
 *
 * Entities and the Board aggregate, the services that load, mutate and
 * save boards, the JSON store, and MCP tools for agents:
 * - card_list, card_add, card_get, card_update, card_move, card_delete
 *
 * Data is stored in .clicky/board.json in the project root.
 */

export { Card } from "./core/Card.js";
export { Column } from "./core/Column.js";
export { Board } from "./core/Board.js";
export type { MoveDirection } from "./core/Board.js";
export type { BoardRecord, CardRecord, ColumnRecord } from "./core/model.js";
export {
  DEFAULT_COLUMNS,
  DEFAULT_COLUMN_ID,
  BOARD_SCHEMA_VERSION,
  formatTimestamp,
} from "./core/model.js";

export {
  notFound,
  alreadyExists,
  invalidInput,
  edgeOfSequence,
  storageFailure,
} from "./core/errors.js";
export type { BoardError, BoardErrorKind, EntityKind } from "./core/errors.js";

export type { BoardStore } from "./core/ports/index.js";
export { BoardService } from "./core/BoardService.js";
export type { LocatedBoard } from "./core/BoardService.js";
export { CardService, FieldUpdate } from "./core/CardService.js";
export type {
  CreateCardInput,
  UpdateCardInput,
  CardFilter,
  CreatedCard,
  FoundCard,
  CardListing,
} from "./core/CardService.js";

export { JsonBoardStore } from "./infrastructure/JsonBoardStore.js";
export { InMemoryBoardStore } from "./infrastructure/InMemoryBoardStore.js";
export { boardSchema, parseBoardRecord } from "./infrastructure/boardSchema.js";
export { DEFAULT_STORE_CONFIG, PATH_ENV_VAR, resolveBasePath } from "./config.js";
export type { BoardStoreConfig, BasePathOptions } from "./config.js";

export { registerCardTools } from "./tools/registerTools.js";
export type { CardToolContext } from "./tools/types.js";
export { startCardServer } from "./server.js";
export type { CardServerOptions } from "./server.js";
