import type { ErrorKind } from './ErrorKind.js';
import type { ErrorContext } from './ValidationError.js';

export interface NoParams {
  readonly kind: 'none';
}

export interface LengthParams {
  readonly kind: 'length';
  /** Maximum length in bytes. */
  readonly length: number;
}

/** Parameters a rule is bound with. Each rule declares the one variant it accepts. */
export type RuleParams = NoParams | LengthParams;

export const NO_PARAMS: NoParams = Object.freeze({ kind: 'none' });

export interface RuleFailure {
  readonly kind: ErrorKind;
  readonly context?: ErrorContext;
}

/** Stateless predicate over one raw field value. */
export interface Rule<P extends RuleParams = NoParams> {
  readonly name: string;
  readonly description: string;
  /** When `true` the rule is skipped for an empty value. */
  readonly requiresValue: boolean;
  check(value: Buffer, params: P): RuleFailure | null;
}

/** A rule closed over the parameters of one field. */
export interface BoundRule {
  readonly name: string;
  readonly requiresValue: boolean;
  readonly params: RuleParams;
  validate(value: Buffer): RuleFailure | null;
}

export function bindRule<P extends RuleParams>(rule: Rule<P>, params: P): BoundRule {
  const fixed: P = { ...params };
  Object.freeze(fixed);

  return Object.freeze({
    name: rule.name,
    requiresValue: rule.requiresValue,
    params: fixed,
    validate: (value: Buffer) => rule.check(value, fixed),
  });
}

export interface UnsupportedType {
  readonly field: string;
  readonly type: string;
}

/** Compiled per-table mapping from field name to its ordered rules. */
export interface Plan {
  readonly rules: ReadonlyMap<string, readonly BoundRule[]>;
  /** Fields whose declared type has no rule; their values are only checked for encoding and presence. */
  readonly unsupportedTypes: readonly UnsupportedType[];
}
