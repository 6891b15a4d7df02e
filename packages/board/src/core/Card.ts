import { timestamp, type CardRecord } from "./model.js";

/**
 * A unit of work on the board.
 *
 * Cards are only created through {@link Board.createCard}. Every setter
 * refreshes `updatedAt`; none of them validate, the service layer does.
 */
export class Card {
  readonly id: string;
  private _title: string;
  private _description: string | undefined;
  private _assignee: string | undefined;
  private _columnId: string;
  private _createdAt: string;
  private _updatedAt: string;

  constructor(id: string, title: string, columnId: string) {
    const now = timestamp();
    this.id = id;
    this._title = title;
    this._description = undefined;
    this._assignee = undefined;
    this._columnId = columnId;
    this._createdAt = now;
    this._updatedAt = now;
  }

  get title(): string {
    return this._title;
  }

  get description(): string | undefined {
    return this._description;
  }

  get assignee(): string | undefined {
    return this._assignee;
  }

  get columnId(): string {
    return this._columnId;
  }

  get createdAt(): string {
    return this._createdAt;
  }

  get updatedAt(): string {
    return this._updatedAt;
  }

  setTitle(title: string): void {
    this._title = title;
    this.touch();
  }

  setDescription(description: string | undefined): void {
    this._description = description;
    this.touch();
  }

  setAssignee(assignee: string | undefined): void {
    this._assignee = assignee;
    this.touch();
  }

  /**
   * Point the card at another column. Column membership lists are the
   * board's responsibility.
   */
  moveTo(columnId: string): void {
    this._columnId = columnId;
    this.touch();
  }

  toJSON(): CardRecord {
    const record: CardRecord = {
      id: this.id,
      title: this._title,
      columnId: this._columnId,
      createdAt: this._createdAt,
      updatedAt: this._updatedAt,
    };
    if (this._description !== undefined) record.description = this._description;
    if (this._assignee !== undefined) record.assignee = this._assignee;
    return record;
  }

  static fromJSON(record: CardRecord): Card {
    const card = new Card(record.id, record.title, record.columnId);
    card._description = record.description;
    card._assignee = record.assignee;
    card._createdAt = record.createdAt;
    card._updatedAt = record.updatedAt;
    return card;
  }

  private touch(): void {
    this._updatedAt = timestamp();
  }
}
