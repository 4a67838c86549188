/**
 * Author Identity
 *
 * Parses free-form "Name <email>" strings. Parsing never fails: input
 * without a trailing <address> becomes a name with no email.
 */

/** Name, then optional whitespace and <local@domain> at the very end */
const AUTHOR_PATTERN = /^(.*?)\s*<([^<>\s]*@[^<>\s]*)>\s*$/s;

export class AuthorIdentity {
  readonly raw: string;
  readonly name: string | undefined;
  readonly email: string | undefined;

  constructor(raw = '', name?: string, email?: string) {
    this.raw = raw;
    this.name = name;
    this.email = email;
    Object.freeze(this);
  }

  get isEmpty(): boolean {
    return this.raw === '';
  }

  /**
   * "name <email>", then "name", then the raw string.
   */
  toString(): string {
    if (!this.name) {
      return this.raw;
    }
    if (!this.email) {
      return this.name;
    }
    return `${this.name} <${this.email}>`;
  }
}

export function emptyAuthor(): AuthorIdentity {
  return new AuthorIdentity();
}

/**
 * A bare "<address>" has no name: name is undefined and toString() gives
 * back the raw string.
 */
export function parseAuthor(raw: string): AuthorIdentity {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return new AuthorIdentity(raw);
  }

  const match = AUTHOR_PATTERN.exec(trimmed);
  if (!match) {
    return new AuthorIdentity(raw, trimmed);
  }

  return new AuthorIdentity(raw, match[1].trim() || undefined, match[2]);
}
