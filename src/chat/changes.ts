/**
 * Dirty tracking over a fixed set of change categories
 */

export const CHANGE_FIELDS = [
  'name',
  'provider',
  'model',
  'temperature',
  'num_ctx',
  'messages',
  'system_prompt',
  'description',
  'submit_on_load',
] as const;

export type ChangeField = (typeof CHANGE_FIELDS)[number];

// Fields a session reports to listeners
export const SESSION_CHANGE_FIELDS: readonly ChangeField[] = [
  'name',
  'provider',
  'model',
  'temperature',
  'num_ctx',
  'messages',
  'system_prompt',
];

// Fields a prompt reports to listeners
export const PROMPT_CHANGE_FIELDS: readonly ChangeField[] = ['name', 'description', 'messages', 'submit_on_load'];

function bitOf(field: ChangeField): number {
  return 1 << CHANGE_FIELDS.indexOf(field);
}

export class ChangeSet {
  private bits = 0;

  constructor(fields: Iterable<ChangeField> = []) {
    for (const field of fields) this.add(field);
  }

  add(...fields: ChangeField[]): this {
    for (const field of fields) this.bits |= bitOf(field);
    return this;
  }

  has(field: ChangeField): boolean {
    return (this.bits & bitOf(field)) !== 0;
  }

  merge(other: ChangeSet): this {
    this.bits |= other.bits;
    return this;
  }

  clear(): void {
    this.bits = 0;
  }

  get isEmpty(): boolean {
    return this.bits === 0;
  }

  /**
   * Changed fields in declaration order, optionally limited to a subset
   */
  toArray(only: readonly ChangeField[] = CHANGE_FIELDS): ChangeField[] {
    return only.filter((field) => this.has(field));
  }

  clone(): ChangeSet {
    return new ChangeSet().merge(this);
  }
}
