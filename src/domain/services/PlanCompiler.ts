import type { Field } from '../model/Field.js';
import type { BoundRule, Plan, UnsupportedType } from '../model/Plan.js';
import type { RuleRegistry } from './FieldRules.js';
import { NO_PARAMS, bindRule } from '../model/Plan.js';
import { DEFAULT_RULE_REGISTRY, encodingRule, requiredRule } from './FieldRules.js';

export interface BoundFieldRules {
  readonly rules: readonly BoundRule[];
  /** `false` when the field's type has no entry in the registry. */
  readonly supported: boolean;
}

/** Encoding first, then Required for required fields, then at most one type rule. */
export function bindFieldRules(field: Field, registry: RuleRegistry = DEFAULT_RULE_REGISTRY): BoundFieldRules {
  const rules: BoundRule[] = [bindRule(encodingRule, NO_PARAMS)];

  if (field.required) {
    rules.push(bindRule(requiredRule, NO_PARAMS));
  }

  const factory = registry.get(field.type.toLowerCase());
  if (!factory) {
    return { rules, supported: false };
  }

  const typeRule = factory(field);
  if (typeRule) {
    rules.push(typeRule);
  }

  return { rules, supported: true };
}

/** Compile the rule lists for the fields matched in a header. One entry per field. */
export function compilePlan(fields: Iterable<Field>, registry: RuleRegistry = DEFAULT_RULE_REGISTRY): Plan {
  const rules = new Map<string, readonly BoundRule[]>();
  const unsupportedTypes: UnsupportedType[] = [];

  for (const field of fields) {
    if (rules.has(field.name)) continue;

    const bound = bindFieldRules(field, registry);
    rules.set(field.name, Object.freeze([...bound.rules]));

    if (!bound.supported) {
      unsupportedTypes.push({ field: field.name, type: field.type });
    }
  }

  return Object.freeze({ rules, unsupportedTypes: Object.freeze(unsupportedTypes) });
}
