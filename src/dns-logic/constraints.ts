import type { RecordSet } from "../defs/types.ts";
import { ConstraintError } from "../defs/errors.ts";

export function checkZoneConstraints(zone: string, records: Array<RecordSet>) {
  const violations = new Array<ConstraintError>();

  const typesByName = new Map<string, Set<string>>();
  for (const record of records) {
    let types = typesByName.get(record.name);
    if (!types) {
      types = new Set();
      typesByName.set(record.name, types);
    }
    types.add(record.type);
  }

  for (const [name, types] of typesByName) {
    if (!types.has('CNAME')) continue;

    if (name === '') {
      violations.push(new ConstraintError(zone, name,
        `CNAME is not allowed at the zone apex`));
    }
    if (types.size > 1) {
      const others = Array.from(types).filter(x => x != 'CNAME').sort();
      violations.push(new ConstraintError(zone, name,
        `CNAME cannot coexist with ${others.join(', ')}`));
    }
  }

  return violations;
}
