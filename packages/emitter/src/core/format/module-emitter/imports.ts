/**
 * Import planning
 *
 * Builds the generated module's import declarations from the names its
 * declarations reference. Nothing is imported that is not used.
 *
 * Ordering is fixed: the runtime module first, then every other module by
 * specifier; within a module default, namespace, then named imports; value
 * specifiers before type-only ones, each group by name.
 */

import type {
  BoundNameUse,
  TsImportDeclarationAst,
  TsImportSpecifierAst,
} from "../backend-ast/index.js";
import type { EmitterOptions } from "../../../types.js";

type PlannedName = {
  readonly importedName: string;
  isValue: boolean;
};

type ModulePlan = {
  readonly named: Map<string, PlannedName>;
  readonly defaults: Map<string, PlannedName>;
  readonly namespaces: Map<string, PlannedName>;
};

const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const emptyPlan = (): ModulePlan => ({
  named: new Map(),
  defaults: new Map(),
  namespaces: new Map(),
});

const record = (
  group: Map<string, PlannedName>,
  module: string,
  name: string,
  importedName: string,
  isValue: boolean
): void => {
  const existing = group.get(name);
  if (!existing) {
    group.set(name, { importedName, isValue });
    return;
  }
  if (existing.importedName !== importedName) {
    throw new Error(
      `ICE: '${name}' bound to both '${existing.importedName}' and '${importedName}' from '${module}'`
    );
  }
  existing.isValue = existing.isValue || isValue;
};

const namedSpecifiers = (
  named: ReadonlyMap<string, PlannedName>
): readonly TsImportSpecifierAst[] => {
  const entries = [...named.entries()];
  const toSpecifier = ([name, planned]: [string, PlannedName]): TsImportSpecifierAst =>
    planned.importedName === name
      ? { name, typeOnly: !planned.isValue }
      : { name, importedName: planned.importedName, typeOnly: !planned.isValue };

  const values = entries.filter(([, p]) => p.isValue).sort(([a], [b]) => byCodeUnit(a, b));
  const types = entries.filter(([, p]) => !p.isValue).sort(([a], [b]) => byCodeUnit(a, b));
  return [...values, ...types].map(toSpecifier);
};

const moduleImports = (module: string, plan: ModulePlan): TsImportDeclarationAst[] => {
  const sortedNames = (group: ReadonlyMap<string, PlannedName>) =>
    [...group.entries()].sort(([a], [b]) => byCodeUnit(a, b));

  const defaults = sortedNames(plan.defaults).map(
    ([name, p]): TsImportDeclarationAst => ({
      kind: "defaultImport",
      module,
      name,
      typeOnly: !p.isValue,
    })
  );
  const namespaces = sortedNames(plan.namespaces).map(
    ([name, p]): TsImportDeclarationAst => ({
      kind: "namespaceImport",
      module,
      name,
      typeOnly: !p.isValue,
    })
  );
  const named: TsImportDeclarationAst[] =
    plan.named.size > 0
      ? [{ kind: "namedImport", module, specifiers: namedSpecifiers(plan.named) }]
      : [];

  return [...defaults, ...namespaces, ...named];
};

/**
 * Plan the imports for a set of bound-name uses.
 */
export const buildImports = (
  uses: readonly BoundNameUse[],
  options: EmitterOptions
): readonly TsImportDeclarationAst[] => {
  const plans = new Map<string, ModulePlan>();
  const planFor = (module: string): ModulePlan => {
    const existing = plans.get(module);
    if (existing) return existing;
    const created = emptyPlan();
    plans.set(module, created);
    return created;
  };

  for (const use of uses) {
    const isValue = use.position === "value";
    const binding = use.binding;

    switch (binding.kind) {
      case "global":
      case "local":
        continue;

      case "runtime":
        record(
          planFor(options.runtimeModule).named,
          options.runtimeModule,
          use.name,
          binding.importedName,
          isValue
        );
        continue;

      case "companion":
        record(planFor(binding.module).named, binding.module, use.name, use.name, isValue);
        continue;

      case "source": {
        const plan = planFor(binding.module);
        const group =
          binding.importKind === "named"
            ? plan.named
            : binding.importKind === "default"
              ? plan.defaults
              : plan.namespaces;
        record(group, binding.module, use.name, binding.importedName, isValue);
        continue;
      }
    }
  }

  const modules = [...plans.keys()].sort((a, b) =>
    a === options.runtimeModule ? -1 : b === options.runtimeModule ? 1 : byCodeUnit(a, b)
  );

  return modules.flatMap((module) => {
    const plan = plans.get(module);
    return plan ? moduleImports(module, plan) : [];
  });
};
