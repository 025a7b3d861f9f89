/**
 * @file message.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export interface MessageProps {
  author: string;
  body: string;
}

/**
 * Immutable chat message, the unit every client sends and receives.
 * Two messages are the same message when author and body match.
 */
export class Message {
  private readonly _author: string;
  private readonly _body: string;

  private constructor(props: MessageProps) {
    this._author = props.author;
    this._body = props.body;
    Object.freeze(this);
  }

  get author(): string {
    return this._author;
  }

  get body(): string {
    return this._body;
  }

  static create(props: MessageProps): Message {
    return new Message({ author: props.author, body: props.body });
  }

  equals(other: Message): boolean {
    return this._author === other._author && this._body === other._body;
  }

  /**
   * Wire shape used by JSON.stringify.
   */
  toJSON(): MessageProps {
    return {
      author: this._author,
      body: this._body,
    };
  }

  toString(): string {
    return `${this._author}: ${this._body}`;
  }
}
