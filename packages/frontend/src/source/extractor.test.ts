import { describe, it } from "mocha";
import { expect } from "chai";
import { extractTypeDecls } from "./extractor.js";

const source = (...lines: readonly string[]): string => lines.join("\n");

const example = source(
  'import { PathPrefix } from "./paths.js";',
  'import { AsString as Str } from "./converters.js";',
  'import * as remote from "./remote.js";',
  'import Default from "./default.js";',
  'import type { u8 } from "./runtime.js";',
  "",
  "/** @archiveWith from(remote.Remote) */",
  "export interface Example {",
  "  a: u8;",
  "  /** @archiveWith from(PathPrefix) via(Str) */",
  "  b: string;",
  "}",
  "",
  "export interface Plain {",
  "  x: number;",
  "}"
);

describe("Source front end", () => {
  describe("mirror declarations", () => {
    it("should read a tagged interface and its tagged members", () => {
      const extraction = extractTypeDecls("example.ts", example);

      expect(extraction.diagnostics).to.deep.equal([]);
      expect(extraction.decls).to.have.length(1);

      const decl = extraction.decls[0];
      expect(decl?.name).to.equal("Example");
      expect(decl?.shape).to.equal("named");
      expect(decl?.directives.map((d) => [d.key, d.args])).to.deep.equal([
        ["from", ["remote.Remote"]],
      ]);
      expect(decl?.fields.map((f) => [f.name, f.type])).to.deep.equal([
        ["a", "u8"],
        ["b", "string"],
      ]);
      expect(decl?.fields[1]?.directives.map((d) => [d.key, d.args])).to.deep.equal([
        ["from", ["PathPrefix"]],
        ["via", ["Str"]],
      ]);
    });

    it("should record declaration and member locations", () => {
      const decl = extractTypeDecls("example.ts", example).decls[0];

      expect(decl?.location?.file).to.equal("example.ts");
      expect(decl?.location?.line).to.equal(8);
      expect(decl?.location?.column).to.equal(18);
      expect(decl?.fields.map((f) => [f.location?.line, f.location?.column])).to.deep.equal([
        [9, 3],
        [11, 3],
      ]);
      expect(decl?.fields[1]?.directives[0]?.location?.line).to.equal(10);
    });

    it("should read getter values and flags", () => {
      const extraction = extractTypeDecls(
        "getter.ts",
        source(
          "/** @archiveWith from(Remote) */",
          "export interface Example {",
          '  /** @archiveWith getter = "owner.read" getter_owned */',
          "  a: u8;",
          "}"
        )
      );

      expect(extraction.decls[0]?.fields[0]?.directives.map((d) => [d.key, d.value])).to.deep.equal([
        ["getter", "owner.read"],
        ["getter_owned", undefined],
      ]);
    });

    it("should read a tuple type alias with positional fields", () => {
      const extraction = extractTypeDecls(
        "pair.ts",
        source(
          "/** @archiveWith from(Pair) */",
          "export type PairMirror = [u8, label: string];"
        )
      );

      const decl = extraction.decls[0];
      expect(decl?.shape).to.equal("tuple");
      expect(decl?.fields.map((f) => [f.name, f.type])).to.deep.equal([
        ["0", "u8"],
        ["1", "string"],
      ]);
    });

    it("should read an empty interface as a unit mirror", () => {
      const extraction = extractTypeDecls(
        "marker.ts",
        source("/** @archiveWith from(Marker) */", "export interface MarkerMirror {}")
      );

      expect(extraction.decls[0]?.shape).to.equal("unit");
      expect(extraction.decls[0]?.fields).to.deep.equal([]);
    });

    it("should take a class whose members alone are tagged", () => {
      const extraction = extractTypeDecls(
        "point.ts",
        source(
          "export class Point {",
          '  /** @archiveWith getter = "geo.x" */',
          "  x: f64 = 0;",
          "  static origin: Point;",
          "  move(): void {}",
          "}"
        )
      );

      const decl = extraction.decls[0];
      expect(decl?.name).to.equal("Point");
      expect(decl?.directives).to.deep.equal([]);
      expect(decl?.fields.map((f) => f.name)).to.deep.equal(["x"]);
    });

    it("should skip declarations without tags", () => {
      const extraction = extractTypeDecls("plain.ts", "export interface Plain { x: number; }");
      expect(extraction.decls).to.deep.equal([]);
    });
  });

  describe("diagnostics", () => {
    it("should report a member without a declared type", () => {
      const extraction = extractTypeDecls(
        "point.ts",
        source(
          "/** @archiveWith from(RemotePoint) */",
          "export class Point {",
          "  x: f64 = 0;",
          "  y = 0;",
          "}"
        )
      );

      expect(extraction.decls).to.deep.equal([]);
      expect(extraction.diagnostics).to.have.length(1);
      expect(extraction.diagnostics[0]?.code).to.equal("AW1003");
      expect(extraction.diagnostics[0]?.fieldName).to.equal("y");
      expect(extraction.diagnostics[0]?.message).to.equal(
        "member 'y' has no declared type"
      );
    });

    it("should report malformed directive text", () => {
      const extraction = extractTypeDecls(
        "broken.ts",
        source("/** @archiveWith from(Remote */", "export interface Broken { a: u8; }")
      );

      expect(extraction.decls).to.deep.equal([]);
      expect(extraction.diagnostics[0]?.code).to.equal("AW1001");
      expect(extraction.diagnostics[0]?.typeName).to.equal("Broken");
      expect(extraction.diagnostics[0]?.message).to.equal(
        "unterminated argument list starting at offset 4"
      );
    });

    it("should read type parameters with their constraints and defaults", () => {
      const extraction = extractTypeDecls(
        "box.ts",
        source(
          "/** @archiveWith from(Box<T, K>) */",
          "export interface BoxMirror<T, K extends keys.Key = u8> { value: T; key: K; }"
        )
      );

      expect(extraction.diagnostics).to.deep.equal([]);
      expect(extraction.decls[0]?.typeParameters).to.deep.equal([
        { name: "T" },
        { name: "K", constraint: "keys.Key", default: "u8" },
      ]);
    });

    it("should read a union of object literal types as variants", () => {
      const extraction = extractTypeDecls(
        "shape.ts",
        source(
          "/** @archiveWith from(Shape) */",
          "export type ShapeMirror =",
          '  | { kind: "circle"; radius: f32 }',
          "  | {",
          '      kind: "label";',
          "      /** @archiveWith via(AsString) */",
          "      text: string;",
          "    }",
          '  | { kind: "empty" };'
        )
      );

      expect(extraction.diagnostics).to.deep.equal([]);
      const decl = extraction.decls[0];
      expect(decl?.shape).to.equal("enum");
      expect(decl?.fields).to.deep.equal([]);
      expect(
        decl?.variants?.map((variant) => variant.fields.map((f) => [f.name, f.type]))
      ).to.deep.equal([
        [
          ["kind", '"circle"'],
          ["radius", "f32"],
        ],
        [
          ["kind", '"label"'],
          ["text", "string"],
        ],
        [["kind", '"empty"']],
      ]);
      expect(decl?.variants?.[1]?.fields[1]?.directives.map((d) => d.key)).to.deep.equal([
        "via",
      ]);
      expect(decl?.variants?.[1]?.location?.line).to.equal(4);
    });

    it("should treat a union as a mirror when only a variant member is tagged", () => {
      const extraction = extractTypeDecls(
        "shape.ts",
        source(
          "export type ShapeMirror =",
          '  | { kind: "circle"; /** @archiveWith via(AsF32) */ radius: f32 }',
          '  | { kind: "empty" };'
        )
      );

      expect(extraction.decls.map((d) => d.name)).to.deep.equal(["ShapeMirror"]);
    });

    it("should reject enum declarations", () => {
      const extraction = extractTypeDecls(
        "color.ts",
        source("/** @archiveWith from(Color) */", "export enum ColorMirror { Red }")
      );

      expect(extraction.diagnostics[0]?.typeName).to.equal("ColorMirror");
      expect(extraction.diagnostics[0]?.message).to.equal(
        "enum declarations cannot be mirrors; declare a union of object literal types with a tag property"
      );
    });

    it("should reject a tagged alias that is not an object or tuple", () => {
      const extraction = extractTypeDecls(
        "id.ts",
        source("/** @archiveWith from(RemoteId) */", "export type Id = string;")
      );

      expect(extraction.diagnostics[0]?.message).to.equal(
        "type alias 'Id' must be an object literal, tuple, or union of object literal types to be a mirror"
      );
    });

    it("should keep sibling declarations when one fails", () => {
      const extraction = extractTypeDecls(
        "mixed.ts",
        source(
          "/** @archiveWith from(Remote */",
          "export interface Broken { a: u8; }",
          "/** @archiveWith from(Remote) */",
          "export interface Fine { a: u8; }"
        )
      );

      expect(extraction.decls.map((d) => d.name)).to.deep.equal(["Fine"]);
      expect(extraction.diagnostics).to.have.length(1);
    });
  });

  describe("references", () => {
    it("should bind imports and top-level declarations", () => {
      const { references } = extractTypeDecls("example.ts", example);

      expect(Object.fromEntries(references)).to.deep.equal({
        PathPrefix: {
          kind: "named",
          name: "PathPrefix",
          importedName: "PathPrefix",
          module: "./paths.js",
        },
        Str: {
          kind: "named",
          name: "Str",
          importedName: "AsString",
          module: "./converters.js",
        },
        remote: { kind: "namespace", name: "remote", module: "./remote.js" },
        Default: { kind: "default", name: "Default", module: "./default.js" },
        u8: { kind: "named", name: "u8", importedName: "u8", module: "./runtime.js" },
        Example: { kind: "local", name: "Example" },
        Plain: { kind: "local", name: "Plain" },
      });
    });
  });
});
