import { describe, it } from "mocha";
import { expect } from "chai";
import { validateTable } from "./orchestrator.js";
import { parseDirectiveModel } from "../directives/parser.js";
import { buildFieldMappingTable } from "../ir/builder.js";
import type { RawDirective, RawFieldDecl, RawTypeDecl } from "../directives/types.js";
import type { FieldMappingTable } from "../ir/types.js";
import type { ValidationOptions } from "./types.js";
import type { SourceReference } from "../source/types.js";

const draft = (
  fields: readonly RawFieldDecl[],
  directives: readonly RawDirective[] = [{ key: "from", args: ["Remote"] }],
  shape: RawTypeDecl["shape"] = "named"
): FieldMappingTable => {
  const decl: RawTypeDecl = { name: "Example", shape, directives, fields };
  const model = parseDirectiveModel(decl);
  if (!model.ok) {
    throw new Error(model.error.map((d) => d.message).join("; "));
  }
  return buildFieldMappingTable(decl, model.value);
};

const validate = (table: FieldMappingTable, options: ValidationOptions = {}) =>
  validateTable(table, options);

describe("Validator", () => {
  it("should accept a consistent table and mark it reconstructable", () => {
    const result = validate(
      draft([
        { name: "a", type: "u8", directives: [] },
        {
          name: "b",
          type: "string",
          directives: [
            { key: "from", args: ["PathPrefix"] },
            { key: "via", args: ["AsString"] },
          ],
        },
      ])
    );

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.fullyReconstructable).to.equal(true);
      expect(result.value.fields.map((f) => f.reconstructable)).to.deep.equal([
        true,
        true,
      ]);
    }
  });

  it("should mark getter fields as not reconstructable", () => {
    const result = validate(
      draft([
        { name: "a", type: "u8", directives: [] },
        { name: "b", type: "u8", directives: [{ key: "getter", value: "owner.b" }] },
      ])
    );

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.fields.map((f) => f.reconstructable)).to.deep.equal([
        true,
        false,
      ]);
      expect(result.value.fullyReconstructable).to.equal(false);
    }
  });

  it("should treat a unit mirror as reconstructable", () => {
    const result = validate(draft([], undefined, "unit"));

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.fullyReconstructable).to.equal(true);
    }
  });

  it("should report a missing remote type", () => {
    const result = validate(draft([{ name: "a", type: "u8", directives: [] }], []));

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error).to.have.length(1);
      expect(result.error[0]?.code).to.equal("AW2001");
      expect(result.error[0]?.message).to.equal(
        "mirror type 'Example' names no remote type"
      );
    }
  });

  it("should report getter_owned without getter on the field", () => {
    const result = validate(
      draft([{ name: "a", type: "u8", directives: [{ key: "getter_owned" }] }])
    );

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.code).to.equal("AW2002");
      expect(result.error[0]?.typeName).to.equal("Example");
      expect(result.error[0]?.fieldName).to.equal("a");
    }
  });

  it("should report a converter equal to the remote field type", () => {
    const result = validate(
      draft([
        {
          name: "b",
          type: "string",
          directives: [
            { key: "from", args: ["AsString"] },
            { key: "via", args: ["AsString"] },
          ],
        },
      ])
    );

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.code).to.equal("AW2003");
      expect(result.error[0]?.message).to.equal(
        "converter 'AsString' is the remote field type itself"
      );
    }
  });

  it("should report a mirror type converting from itself", () => {
    const result = validate(
      draft([
        { name: "inner", type: "Inner", directives: [{ key: "from", args: ["Inner"] }] },
      ])
    );

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.message).to.equal("'Inner' cannot convert from itself");
    }
  });

  it("should report a collection declared as its own converter", () => {
    const result = validate(
      draft([
        {
          name: "items",
          type: "ItemMirror[]",
          directives: [{ key: "from", args: ["Vec<Item>"] }],
        },
      ])
    );

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.message).to.equal(
        "'ItemMirror[]' is not a mirror type and cannot convert 'Vec<Item>'"
      );
    }
  });

  it("should accept a generic mirror as its own converter", () => {
    const result = validate(
      draft([
        {
          name: "inner",
          type: "Inner<u8>",
          directives: [{ key: "from", args: ["RemoteInner<u8>"] }],
        },
      ])
    );

    expect(result.ok).to.equal(true);
  });

  it("should report any converter of a chain equal to the remote field type", () => {
    const result = validate(
      draft([
        {
          name: "b",
          type: "string",
          directives: [
            { key: "from", args: ["Wrapped"] },
            { key: "via", args: ["Outer", "Wrapped"] },
          ],
        },
      ])
    );

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.message).to.equal(
        "converter 'Wrapped' is the remote field type itself"
      );
    }
  });

  describe("union mirrors", () => {
    const union = (variantFields: readonly RawFieldDecl[]): FieldMappingTable => {
      const decl: RawTypeDecl = {
        name: "Shape",
        shape: "enum",
        directives: [{ key: "from", args: ["RemoteShape"] }],
        fields: [],
        variants: [
          { fields: [{ name: "kind", type: '"circle"', directives: [] }, ...variantFields] },
          { fields: [{ name: "kind", type: '"empty"', directives: [] }] },
        ],
      };
      const model = parseDirectiveModel(decl);
      if (!model.ok) {
        throw new Error(model.error.map((d) => d.message).join("; "));
      }
      return buildFieldMappingTable(decl, model.value);
    };

    it("should report variant fields by tag and field name", () => {
      const result = validate(
        union([{ name: "radius", type: "f32", directives: [{ key: "getter_owned" }] }])
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("AW2002");
        expect(result.error[0]?.fieldName).to.equal("circle.radius");
      }
    });

    it("should mark variant fields and the table reconstructable", () => {
      const result = validate(union([{ name: "radius", type: "f32", directives: [] }]));

      expect(result.ok && result.value.variants[0]?.fields[0]?.reconstructable).to.equal(true);
      expect(result.ok && result.value.fullyReconstructable).to.equal(true);
    });

    it("should not rebuild a union with a getter in any variant", () => {
      const result = validate(
        union([
          { name: "radius", type: "f32", directives: [{ key: "getter", value: "shapes.radius" }] },
        ])
      );

      expect(result.ok && result.value.fullyReconstructable).to.equal(false);
    });
  });

  describe("converter registry", () => {
    const options: ValidationOptions = {
      converters: {
        AsString: { accepts: ["string", "PathPrefix"] },
        Map: { accepts: ["Vec"] },
      },
    };

    it("should report an input type the converter does not accept", () => {
      const result = validate(
        draft([
          {
            name: "b",
            type: "string",
            directives: [
              { key: "from", args: ["u32"] },
              { key: "via", args: ["AsString"] },
            ],
          },
        ]),
        options
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "converter 'AsString' does not accept 'u32'"
        );
        expect(result.error[0]?.hint).to.equal(
          "accepted input types: string, PathPrefix"
        );
      }
    });

    it("should match generic paths by their head", () => {
      const result = validate(
        draft([
          {
            name: "paths",
            type: "string[]",
            directives: [
              { key: "from", args: ["Vec<PathPrefix>"] },
              { key: "via", args: ["Map<AsString>"] },
            ],
          },
        ]),
        options
      );

      expect(result.ok).to.equal(true);
    });

    it("should check the innermost converter of a chain", () => {
      const result = validate(
        draft([
          {
            name: "b",
            type: "string",
            directives: [
              { key: "from", args: ["u32"] },
              { key: "via", args: ["Map", "AsString"] },
            ],
          },
        ]),
        options
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal("converter 'AsString' does not accept 'u32'");
      }
    });

    it("should defer converters it does not know", () => {
      const result = validate(
        draft([
          {
            name: "b",
            type: "string",
            directives: [
              { key: "from", args: ["u32"] },
              { key: "via", args: ["AsDecimal"] },
            ],
          },
        ]),
        options
      );

      expect(result.ok).to.equal(true);
    });

    it("should ignore inherited object keys", () => {
      const result = validate(
        draft([
          {
            name: "b",
            type: "string",
            directives: [
              { key: "from", args: ["u32"] },
              { key: "via", args: ["constructor"] },
            ],
          },
        ]),
        options
      );

      expect(result.ok).to.equal(true);
    });
  });

  it("should report remote types that share an adapter name", () => {
    const result = validate(
      draft([], [{ key: "from", args: ["a.Remote", "b.Remote"] }], "unit")
    );

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.code).to.equal("AW2004");
      expect(result.error[0]?.message).to.equal(
        "remote types 'a.Remote' and 'b.Remote' both produce adapter 'ExampleFromRemote'"
      );
    }
  });

  it("should collect every failure in rule order", () => {
    const result = validate(
      draft([{ name: "a", type: "u8", directives: [{ key: "getter_owned" }] }], [])
    );

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.map((d) => d.code)).to.deep.equal(["AW2001", "AW2002"]);
    }
  });

  describe("nested mirrors", () => {
    const nested = draft([
      { name: "inner", type: "InnerMirror", directives: [{ key: "from", args: ["Inner"] }] },
    ]);

    const withReference = (reference?: SourceReference): ValidationOptions => ({
      references: new Map<string, SourceReference>(reference ? [["InnerMirror", reference]] : []),
    });

    it("should accept a mirror declared in the same file", () => {
      const result = validate(nested, withReference({ kind: "local", name: "InnerMirror" }));
      expect(result.ok).to.equal(true);
    });

    it("should accept a mirror imported by name from a relative module", () => {
      const result = validate(
        nested,
        withReference({
          kind: "named",
          name: "InnerMirror",
          importedName: "InnerMirror",
          module: "./inner.js",
        })
      );
      expect(result.ok).to.equal(true);
    });

    it("should report a mirror that is not bound in the file", () => {
      const result = validate(nested, withReference());

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("AW2005");
        expect(result.error[0]?.message).to.equal(
          "nested mirror 'InnerMirror' is neither declared nor imported in this file"
        );
      }
    });

    it("should report a mirror imported from a package", () => {
      const result = validate(
        nested,
        withReference({
          kind: "named",
          name: "InnerMirror",
          importedName: "InnerMirror",
          module: "mirrors",
        })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "nested mirror 'InnerMirror' is imported from package 'mirrors'; only relative modules have generated adapters"
        );
      }
    });

    it("should report a default import", () => {
      const result = validate(
        nested,
        withReference({ kind: "default", name: "InnerMirror", module: "./inner.js" })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "nested mirror 'InnerMirror' must be imported by name"
        );
      }
    });

    it("should skip the check without references", () => {
      expect(validate(nested).ok).to.equal(true);
    });
  });
});
