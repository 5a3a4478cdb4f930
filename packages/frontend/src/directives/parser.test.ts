/**
 * Tests for the Directive Model parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseDirectiveModel } from "./parser.js";
import { RawFieldDecl, RawTypeDecl, RawVariantDecl } from "./types.js";
import { renderTypePath } from "../types/type-path.js";

const field = (
  name: string,
  type: string,
  directives: RawFieldDecl["directives"] = []
): RawFieldDecl => ({ name, type, directives });

const decl = (overrides: Partial<RawTypeDecl> = {}): RawTypeDecl => ({
  name: "Example",
  shape: "named",
  directives: [{ key: "from", args: ["Remote"] }],
  fields: [],
  ...overrides,
});

describe("Directive Model parser", () => {
  describe("type-level directives", () => {
    it("should collect remote types across several 'from' directives", () => {
      const result = parseDirectiveModel(
        decl({
          directives: [
            { key: "from", args: ["Remote", "remote::Legacy"] },
            { key: "from", args: ["Other<u8>"] },
          ],
        })
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.remoteTypes.map(renderTypePath)).to.deep.equal([
          "Remote",
          "remote.Legacy",
          "Other<u8>",
        ]);
      }
    });

    it("should leave remote types empty when no directive is given", () => {
      const result = parseDirectiveModel(decl({ directives: [] }));

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.remoteTypes).to.deep.equal([]);
      }
    });

    it("should reject unknown type-level keys", () => {
      const result = parseDirectiveModel(
        decl({ directives: [{ key: "into", args: ["Remote"] }] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.have.length(1);
        expect(result.error[0]?.code).to.equal("AW1001");
        expect(result.error[0]?.typeName).to.equal("Example");
        expect(result.error[0]?.message).to.equal(
          "unknown type-level directive 'into'; expected one of from, tag"
        );
      }
    });

    it("should reject 'from' without arguments", () => {
      const result = parseDirectiveModel(
        decl({ directives: [{ key: "from", args: [] }] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "'from' requires at least one type"
        );
      }
    });

    it("should reject an unparsable remote type", () => {
      const result = parseDirectiveModel(
        decl({ directives: [{ key: "from", args: ["Remote<"] }] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "invalid type path 'Remote<' in 'from': expected identifier, found end of input"
        );
      }
    });
  });

  describe("field directives", () => {
    it("should parse from, via, getter and getter_owned", () => {
      const result = parseDirectiveModel(
        decl({
          fields: [
            field("a", "u8"),
            field("b", "string", [
              { key: "from", args: ["PathPrefix"] },
              { key: "via", args: ["AsString"] },
            ]),
            field("c", "u32", [
              { key: "getter", value: "owner.read" },
              { key: "getter_owned" },
            ]),
          ],
        })
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        const [a, b, c] = result.value.fields;
        expect(a?.from).to.be.undefined;
        expect(a?.via).to.be.undefined;
        expect(a?.getterOwned).to.equal(false);
        expect(b && b.from && renderTypePath(b.from)).to.equal("PathPrefix");
        expect(b?.via?.map(renderTypePath)).to.deep.equal(["AsString"]);
        expect(c?.getter?.segments).to.deep.equal(["owner", "read"]);
        expect(c?.getterOwned).to.equal(true);
      }
    });

    it("should keep a via chain in order, outermost first", () => {
      const result = parseDirectiveModel(
        decl({
          fields: [field("a", "u8[]", [{ key: "via", args: ["Map<AsString>", "codecs::Inline"] }])],
        })
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.fields[0]?.via?.map(renderTypePath)).to.deep.equal([
          "Map<AsString>",
          "codecs.Inline",
        ]);
      }
    });

    it("should reject 'via' without converters", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "u8", [{ key: "via", args: [] }])] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal("'via' takes one or more converter types");
        expect(result.error[0]?.hint).to.equal("via(Converter) or via(Outer, Inner)");
      }
    });

    it("should check every converter of a chain", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "u8", [{ key: "via", args: ["AsString", "Inline[]"] }])] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "converter path 'Inline[]' cannot end in '[]'"
        );
      }
    });

    it("should keep getter_owned without getter for the validator", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "u8", [{ key: "getter_owned" }])] })
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.fields[0]?.getterOwned).to.equal(true);
        expect(result.value.fields[0]?.getter).to.be.undefined;
      }
    });

    it("should reject unknown field keys with the field attached", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "u8", [{ key: "rename", value: "b" }])] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.fieldName).to.equal("a");
        expect(result.error[0]?.message).to.equal(
          "unknown field directive 'rename'; expected one of from, via, getter, getter_owned"
        );
      }
    });

    it("should reject a field 'from' with two types", () => {
      const result = parseDirectiveModel(
        decl({
          fields: [field("a", "u8", [{ key: "from", args: ["A", "B"] }])],
        })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "'from' on a field takes exactly one type"
        );
        expect(result.error[0]?.hint).to.equal("from(Type)");
      }
    });

    it("should reject a converter path with an array suffix", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "u8", [{ key: "via", args: ["AsString[]"] }])] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "converter path 'AsString[]' cannot end in '[]'"
        );
      }
    });

    it("should reject array type arguments inside a converter path", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "u8", [{ key: "via", args: ["Map<Vec<u8[]>>"] }])] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "converter path 'Map<Vec<u8[]>>' cannot take array type arguments"
        );
      }
    });

    it("should reject getter given as an argument list", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "u8", [{ key: "getter", args: ["owner.read"] }])] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal("'getter' takes a string value");
      }
    });

    it("should reject getter_owned with a value", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "u8", [{ key: "getter_owned", value: "yes" }])] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "'getter_owned' is a flag and takes no arguments"
        );
      }
    });

    it("should reject repeated keys on one field", () => {
      const result = parseDirectiveModel(
        decl({
          fields: [
            field("a", "u8", [
              { key: "via", args: ["A"] },
              { key: "via", args: ["B"] },
            ]),
          ],
        })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal("duplicate 'via' directive");
      }
    });

    it("should reject a declared type that is not a type path", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "string | null")] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("AW1001");
        expect(result.error[0]?.hint).to.equal(
          "declare a named type alias for the field's type"
        );
      }
    });

    it("should report duplicate field names as AW1002", () => {
      const result = parseDirectiveModel(
        decl({ fields: [field("a", "u8"), field("a", "u16")] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.have.length(1);
        expect(result.error[0]?.code).to.equal("AW1002");
        expect(result.error[0]?.message).to.equal("duplicate field 'a'");
      }
    });

    it("should report every problem in one pass", () => {
      const result = parseDirectiveModel(
        decl({
          directives: [{ key: "into" }],
          fields: [field("a", "u8", [{ key: "nope" }])],
        })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.have.length(2);
      }
    });
  });

  describe("shapes", () => {
    it("should accept tuple fields named by position", () => {
      const result = parseDirectiveModel(
        decl({ shape: "tuple", fields: [field("0", "u8"), field("1", "u16")] })
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.shape).to.equal("tuple");
        expect(result.value.fields.map((f) => f.name)).to.deep.equal(["0", "1"]);
      }
    });

    it("should reject tuple fields out of position", () => {
      const result = parseDirectiveModel(
        decl({ shape: "tuple", fields: [field("1", "u8")] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "tuple field at position 0 must be named '0', found '1'"
        );
      }
    });

    it("should reject fields on a unit mirror", () => {
      const result = parseDirectiveModel(
        decl({ shape: "unit", fields: [field("a", "u8")] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "a unit mirror cannot declare fields"
        );
      }
    });
  });

  describe("type parameters", () => {
    it("should parse constraints and defaults as type paths", () => {
      const result = parseDirectiveModel(
        decl({
          typeParameters: [
            { name: "T" },
            { name: "K", constraint: "keys::Key", default: "u8" },
          ],
        })
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        const [t, k] = result.value.typeParameters;
        expect(t).to.deep.equal({ name: "T" });
        expect(k?.name).to.equal("K");
        expect(k?.constraint && renderTypePath(k.constraint)).to.equal("keys.Key");
        expect(k?.default && renderTypePath(k.default)).to.equal("u8");
      }
    });

    it("should reject a constraint that is not a type path", () => {
      const result = parseDirectiveModel(
        decl({ typeParameters: [{ name: "K", constraint: "keyof Remote" }] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "constraint 'keyof Remote' of type parameter 'K' is not a type path: unexpected 'R' at offset 6"
        );
      }
    });
  });

  describe("union mirrors", () => {
    const variant = (...fields: readonly RawFieldDecl[]): RawVariantDecl => ({ fields });

    const union = (
      variants: readonly RawVariantDecl[],
      directives: RawTypeDecl["directives"] = [{ key: "from", args: ["Shape"] }]
    ): RawTypeDecl => decl({ shape: "enum", directives, variants });

    it("should split each variant into its tag and fields", () => {
      const result = parseDirectiveModel(
        union([
          variant(field("kind", '"circle"'), field("radius", "f32")),
          variant(field("kind", "'two-words'")),
        ])
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.tagKey).to.equal("kind");
        expect(
          result.value.variants.map((v) => [v.tag, v.name, v.fields.map((f) => f.name)])
        ).to.deep.equal([
          ["circle", "Circle", ["radius"]],
          ["two-words", "TwoWords", []],
        ]);
      }
    });

    it("should use the tag property named by 'tag'", () => {
      const result = parseDirectiveModel(
        union(
          [variant(field("type", '"a"'), field("kind", "u8"))],
          [
            { key: "from", args: ["Shape"] },
            { key: "tag", value: "type" },
          ]
        )
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.tagKey).to.equal("type");
        expect(result.value.variants[0]?.fields.map((f) => f.name)).to.deep.equal(["kind"]);
      }
    });

    it("should reject 'tag' on a mirror that is not a union", () => {
      const result = parseDirectiveModel(
        decl({ directives: [{ key: "tag", value: "type" }] })
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal("'tag' only applies to union mirrors");
      }
    });

    it("should reject a variant without the tag property", () => {
      const result = parseDirectiveModel(union([variant(field("radius", "f32"))]));

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal("variant at position 0 has no 'kind' property");
      }
    });

    it("should reject a tag that is not a string literal type", () => {
      const result = parseDirectiveModel(union([variant(field("kind", "string"))]));

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "tag property 'kind' of variant at position 0 must be a string literal type, found 'string'"
        );
      }
    });

    it("should report repeated and colliding variants as AW1002", () => {
      const result = parseDirectiveModel(
        union([
          variant(field("kind", '"a-b"')),
          variant(field("kind", '"a-b"')),
          variant(field("kind", '"aB"')),
        ])
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => [d.code, d.message])).to.deep.equal([
          ["AW1002", "duplicate variant 'a-b'"],
          ["AW1002", "variants 'a-b' and 'aB' both produce 'AB'"],
        ]);
      }
    });

    it("should name variant fields by tag in diagnostics", () => {
      const result = parseDirectiveModel(
        union([variant(field("kind", '"circle"'), field("radius", "f32", [{ key: "nope" }]))])
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.fieldName).to.equal("circle.radius");
      }
    });

    it("should reject a union without variants", () => {
      const result = parseDirectiveModel(union([]));

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal("a union mirror needs at least one variant");
      }
    });
  });
});
