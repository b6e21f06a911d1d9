/**
 * Lookups on name-keyed records. Faction and senator names are open strings,
 * so a name such as "constructor" must not reach Object.prototype.
 */

export function ownValue<V>(record: Readonly<Record<string, V>> | undefined, key: string): V | undefined {
  if (record === undefined) return undefined;
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
