import type { ColumnRecord } from "./model.js";

/**
 * A workflow stage holding an ordered list of card ids.
 *
 * The order of `cards` is the display order within the column.
 */
export class Column {
  readonly id: string;
  readonly name: string;
  readonly order: number;
  private readonly _cards: string[] = [];

  constructor(id: string, name: string, order: number) {
    this.id = id;
    this.name = name;
    this.order = order;
  }

  get cards(): readonly string[] {
    return this._cards;
  }

  /**
   * Append a card id. Adding an id that is already present does nothing.
   */
  addCard(cardId: string): void {
    if (!this._cards.includes(cardId)) {
      this._cards.push(cardId);
    }
  }

  /**
   * Remove a card id. Returns whether it was present.
   */
  removeCard(cardId: string): boolean {
    const index = this._cards.indexOf(cardId);
    if (index === -1) return false;
    this._cards.splice(index, 1);
    return true;
  }

  hasCard(cardId: string): boolean {
    return this._cards.includes(cardId);
  }

  cardCount(): number {
    return this._cards.length;
  }

  indexOf(cardId: string): number {
    return this._cards.indexOf(cardId);
  }

  /**
   * Swap a card with the one above it.
   * Returns false, leaving the order untouched, for the first card or an unknown id.
   */
  moveCardUp(cardId: string): boolean {
    const index = this._cards.indexOf(cardId);
    if (index <= 0) return false;
    this.swap(index, index - 1);
    return true;
  }

  /**
   * Swap a card with the one below it.
   * Returns false, leaving the order untouched, for the last card or an unknown id.
   */
  moveCardDown(cardId: string): boolean {
    const index = this._cards.indexOf(cardId);
    if (index === -1 || index === this._cards.length - 1) return false;
    this.swap(index, index + 1);
    return true;
  }

  toJSON(): ColumnRecord {
    return {
      id: this.id,
      name: this.name,
      order: this.order,
      cards: [...this._cards],
    };
  }

  static fromJSON(record: ColumnRecord): Column {
    const column = new Column(record.id, record.name, record.order);
    for (const cardId of record.cards) {
      column.addCard(cardId);
    }
    return column;
  }

  private swap(a: number, b: number): void {
    const held = this._cards[a];
    this._cards[a] = this._cards[b];
    this._cards[b] = held;
  }
}
