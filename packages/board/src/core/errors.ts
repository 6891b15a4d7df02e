/**
 * Error taxonomy for board operations.
 * Services return these inside a Result; `message` is ready to show a user.
 */

import type { MoveDirection } from "./Board.js";

export type EntityKind = "board" | "card" | "column";

export type BoardError =
  | { kind: "not_found"; entity: EntityKind; id: string; message: string }
  | { kind: "already_exists"; location: string; message: string }
  | { kind: "invalid_input"; field: string; message: string }
  | { kind: "edge_of_sequence"; cardId: string; direction: MoveDirection; message: string }
  | { kind: "storage_failure"; location: string; cause: Error; message: string };

export type BoardErrorKind = BoardError["kind"];

export function notFound(entity: EntityKind, id: string): BoardError {
  const message =
    entity === "board"
      ? "No board found. Run 'clicky init' to create one."
      : `${entity === "card" ? "Card" : "Column"} not found: ${id}`;
  return { kind: "not_found", entity, id, message };
}

export function alreadyExists(location: string): BoardError {
  return {
    kind: "already_exists",
    location,
    message: "Board already initialized in this directory",
  };
}

export function invalidInput(field: string, message: string): BoardError {
  return { kind: "invalid_input", field, message };
}

export function edgeOfSequence(cardId: string, direction: MoveDirection): BoardError {
  return {
    kind: "edge_of_sequence",
    cardId,
    direction,
    message: `Card ${cardId} is already at the ${direction === "up" ? "top" : "bottom"} of its column`,
  };
}

export function storageFailure(location: string, cause: Error): BoardError {
  return {
    kind: "storage_failure",
    location,
    cause,
    message: `Storage error: ${cause.message}`,
  };
}
