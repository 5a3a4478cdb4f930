/**
 * Generated names
 *
 * Every generated name is fixed by the mirror name and, for per-remote
 * units, the remote type's last path segment. Type arguments never take
 * part in a name.
 */

import { pathName, TypePath } from "@archive-with/frontend";
import { isIdentifierName } from "./format/backend-ast/index.js";

export const archivedName = (mirror: string): string => `Archived${mirror}`;

export const resolverName = (mirror: string): string => `${mirror}Resolver`;

/** Archived form of one variant of a union mirror: `ArchivedShapeCircle` */
export const archivedVariantName = (mirror: string, variant: string): string =>
  archivedName(`${mirror}${variant}`);

export const resolverVariantName = (mirror: string, variant: string): string =>
  resolverName(`${mirror}${variant}`);

export const adapterName = (mirror: string, remote: TypePath): string =>
  `${mirror}From${pathName(remote)}`;

export const deserializeName = (mirror: string, remote: TypePath): string =>
  `deserialize${adapterName(mirror, remote)}`;

/**
 * Allocates `__`-prefixed locals for field values, one per field,
 * unique within one function body.
 */
export const createLocalNames = (): ((fieldName: string) => string) => {
  const used = new Set<string>();

  return (fieldName) => {
    const base = `__${isIdentifierName(fieldName) ? fieldName : fieldName.replace(/[^A-Za-z0-9_$]/g, "_")}`;
    let name = base;
    for (let suffix = 2; used.has(name); suffix++) {
      name = `${base}_${suffix}`;
    }
    used.add(name);
    return name;
  };
};
