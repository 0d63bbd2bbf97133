/** Column types with a dedicated rule. `clob`, `text`, `float`, `decimal` and `timestamp` are accepted as aliases. */
export type FieldType = 'string' | 'integer' | 'biginteger' | 'number' | 'date' | 'datetime';

export interface Field {
  readonly name: string;
  /** One of {@link FieldType} or an alias. Any other value is accepted but gets no type rule. */
  readonly type: string;
  readonly required: boolean;
  /** Maximum value length in bytes. Only applies to string-like types. */
  readonly maxLength?: number;
}
