/**
 * Contract between persistent records and the JSON encoder.
 *
 * A record becomes an entity by carrying a descriptor under
 * `ENTITY_DESCRIPTOR`. The encoder then emits only `columns`, drops the
 * ones in `hide`, replaces the ones in `mask` with a presence flag and
 * appends the computed `extra` fields.
 */

export const ENTITY_DESCRIPTOR: unique symbol = Symbol("entityDescriptor");

export interface EntityFields {
  columns: readonly string[];
  hide?: readonly string[];
  mask?: readonly string[];
  extra?: readonly string[];
}

export interface EntityDescriptor<T> extends EntityFields {
  columns: readonly (keyof T & string)[];
  hide?: readonly (keyof T & string)[];
  mask?: readonly (keyof T & string)[];
}

export type Entity<T extends object> = T & {
  readonly [ENTITY_DESCRIPTOR]: EntityDescriptor<T>;
};

export function defineEntity<T extends object>(
  descriptor: EntityDescriptor<T>,
  values: T,
): Entity<T> {
  return { ...values, [ENTITY_DESCRIPTOR]: descriptor };
}

function isEntityFields(value: unknown): value is EntityFields {
  return (
    typeof value === "object" &&
    value !== null &&
    "columns" in value &&
    Array.isArray(value.columns)
  );
}

/** Returns the descriptor an entity carries, or null for other values. */
export function entityFieldsOf(value: object): EntityFields | null {
  if (!(ENTITY_DESCRIPTOR in value)) return null;
  const descriptor = value[ENTITY_DESCRIPTOR];
  return isEntityFields(descriptor) ? descriptor : null;
}
