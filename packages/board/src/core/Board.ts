import { Card } from "./Card.js";
import { Column } from "./Column.js";
import {
  BOARD_SCHEMA_VERSION,
  DEFAULT_COLUMN_ID,
  DEFAULT_COLUMNS,
  timestamp,
  type BoardRecord,
} from "./model.js";

export type MoveDirection = "up" | "down";

/**
 * The board aggregate.
 *
 * Cards live in a flat list; their order lives in each column's `cards`.
 * Both sides of that relationship are only changed here, so after every
 * public method:
 * - each card's `columnId` names exactly one column,
 * - each column lists exactly the cards pointing at it, once,
 * - card ids are unique and `nextCardNumber` never goes down,
 * - at least one column exists.
 */
export class Board {
  readonly id: string;
  readonly name: string;
  private _cardIdPrefix: string;
  private _nextCardNumber = 1;
  private _columns: Column[];
  private _cards: Card[] = [];
  private _createdAt: string;
  private _updatedAt: string;

  constructor(id: string, name: string) {
    const now = timestamp();
    this.id = id;
    this.name = name;
    this._cardIdPrefix = Board.derivePrefix(id);
    this._columns = DEFAULT_COLUMNS.map((c) => new Column(c.id, c.name, c.order));
    this._createdAt = now;
    this._updatedAt = now;
  }

  /**
   * Card id prefix: the first three letters of the board id, uppercased.
   * Digits and punctuation are skipped; shorter ids give shorter prefixes.
   */
  static derivePrefix(boardId: string): string {
    return Array.from(boardId)
      .filter((ch) => /\p{Alphabetic}/u.test(ch))
      .slice(0, 3)
      .join("")
      .toUpperCase();
  }

  get cardIdPrefix(): string {
    return this._cardIdPrefix;
  }

  get nextCardNumber(): number {
    return this._nextCardNumber;
  }

  get columns(): readonly Column[] {
    return this._columns;
  }

  get cards(): readonly Card[] {
    return this._cards;
  }

  get createdAt(): string {
    return this._createdAt;
  }

  get updatedAt(): string {
    return this._updatedAt;
  }

  /**
   * Consume the next card number and format it as PREFIX-NNN.
   * The number is gone for good even if the caller never uses the id.
   */
  generateCardId(): string {
    const id = `${this._cardIdPrefix}-${String(this._nextCardNumber).padStart(3, "0")}`;
    this._nextCardNumber += 1;
    this.touch();
    return id;
  }

  /**
   * Create a card at the bottom of a column ("todo" by default).
   *
   * Returns the new id, or null when the column does not exist. The column
   * is checked before an id is generated, so a rejected call changes nothing.
   */
  createCard(
    title: string,
    description?: string,
    assignee?: string,
    columnId: string = DEFAULT_COLUMN_ID
  ): string | null {
    const column = this.getColumn(columnId);
    if (!column) return null;

    const cardId = this.generateCardId();
    const card = new Card(cardId, title, columnId);
    if (description !== undefined) card.setDescription(description);
    if (assignee !== undefined) card.setAssignee(assignee);

    column.addCard(cardId);
    this._cards.push(card);
    this.touch();

    return cardId;
  }

  /**
   * Move a card to the end of another column.
   * Returns false without changes if the card or the column is unknown.
   */
  moveCard(cardId: string, targetColumnId: string): boolean {
    const target = this.getColumn(targetColumnId);
    const card = this.getCard(cardId);
    if (!target || !card) return false;

    this.getColumn(card.columnId)?.removeCard(cardId);
    target.addCard(cardId);
    card.moveTo(targetColumnId);
    this.touch();

    return true;
  }

  /**
   * Swap a card with its neighbour inside its own column.
   * Returns false when the card is unknown or already at that edge.
   */
  moveCardWithinColumn(cardId: string, direction: MoveDirection): boolean {
    const card = this.getCard(cardId);
    if (!card) return false;

    const column = this.getColumn(card.columnId);
    if (!column) return false;

    const moved = direction === "up" ? column.moveCardUp(cardId) : column.moveCardDown(cardId);
    if (moved) this.touch();
    return moved;
  }

  getCard(cardId: string): Card | undefined {
    return this._cards.find((c) => c.id === cardId);
  }

  getColumn(columnId: string): Column | undefined {
    return this._columns.find((c) => c.id === columnId);
  }

  /**
   * Position of a column in display order, or -1.
   */
  columnIndex(columnId: string): number {
    return this._columns.findIndex((c) => c.id === columnId);
  }

  /**
   * Remove a card from its column and from the board.
   */
  deleteCard(cardId: string): boolean {
    const index = this._cards.findIndex((c) => c.id === cardId);
    if (index === -1) return false;

    const card = this._cards[index];
    this.getColumn(card.columnId)?.removeCard(cardId);
    this._cards.splice(index, 1);
    this.touch();

    return true;
  }

  /**
   * Add a column and re-sort by `order`. Equal orders keep insertion order.
   * Returns false if the id is taken.
   */
  addColumn(id: string, name: string, order: number): boolean {
    if (this.getColumn(id)) return false;

    this._columns.push(new Column(id, name, order));
    this._columns.sort((a, b) => a.order - b.order);
    this.touch();

    return true;
  }

  /**
   * Remove a column, first moving its cards to the first other column
   * in display order. The last column can never be removed.
   */
  removeColumn(columnId: string): boolean {
    if (this._columns.length <= 1) return false;

    const index = this.columnIndex(columnId);
    if (index === -1) return false;

    const fallback = this._columns.find((c) => c.id !== columnId);
    if (!fallback) return false;

    for (const cardId of [...this._columns[index].cards]) {
      this.moveCard(cardId, fallback.id);
    }

    this._columns.splice(index, 1);
    this.touch();

    return true;
  }

  /**
   * Cards whose columnId matches, in board list order.
   * For display order use {@link cardsInColumnOrder}.
   */
  getCardsInColumn(columnId: string): Card[] {
    return this._cards.filter((c) => c.columnId === columnId);
  }

  /**
   * Cards of a column in the column's own (manual) order.
   */
  cardsInColumnOrder(columnId: string): Card[] {
    const column = this.getColumn(columnId);
    if (!column) return [];

    const cards: Card[] = [];
    for (const cardId of column.cards) {
      const card = this.getCard(cardId);
      if (card) cards.push(card);
    }
    return cards;
  }

  touch(): void {
    this._updatedAt = timestamp();
  }

  toJSON(): BoardRecord {
    return {
      version: BOARD_SCHEMA_VERSION,
      id: this.id,
      name: this.name,
      cardIdPrefix: this._cardIdPrefix,
      nextCardNumber: this._nextCardNumber,
      columns: this._columns.map((c) => c.toJSON()),
      cards: this._cards.map((c) => c.toJSON()),
      createdAt: this._createdAt,
      updatedAt: this._updatedAt,
    };
  }

  /**
   * Rebuild a board from its record. The stored prefix wins over the derived one.
   */
  static fromJSON(record: BoardRecord): Board {
    const board = new Board(record.id, record.name);
    board._cardIdPrefix = record.cardIdPrefix;
    board._nextCardNumber = record.nextCardNumber;
    board._columns = record.columns.map((c) => Column.fromJSON(c));
    board._cards = record.cards.map((c) => Card.fromJSON(c));
    board._createdAt = record.createdAt;
    board._updatedAt = record.updatedAt;
    return board;
  }
}
