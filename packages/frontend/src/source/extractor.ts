/**
 * Source front end - reads mirror declarations out of TypeScript source
 *
 * A top-level interface, class or type alias is a mirror when it, or one
 * of its members, carries an `@archiveWith` JSDoc tag:
 *
 *   /** @archiveWith from(Remote) *\/
 *   export interface Example {
 *     a: u8;
 *     /** @archiveWith from(PathPrefix) via(AsString) *\/
 *     b: string;
 *   }
 *
 * A type alias of a union of object literal types is a union mirror; each
 * member is a variant.
 */

import * as ts from "typescript";
import { createDiagnostic, Diagnostic } from "../types/diagnostic.js";
import type {
  MirrorShape,
  RawDirective,
  RawFieldDecl,
  RawTypeDecl,
  RawTypeParameter,
  RawVariantDecl,
} from "../directives/types.js";
import { tokenizeDirectiveText } from "../directives/tokenizer.js";
import { getNodeLocation } from "./location.js";
import { collectReferences } from "./references.js";
import type { SourceExtraction } from "./types.js";

export const DIRECTIVE_TAG = "archiveWith";

type MirrorCandidate =
  | ts.InterfaceDeclaration
  | ts.ClassDeclaration
  | ts.TypeAliasDeclaration;

type Extracted<T> = {
  readonly value: T;
  readonly diagnostics: readonly Diagnostic[];
};

type MemberNode = {
  readonly node: ts.Node;
  readonly name: ts.PropertyName | undefined;
  readonly type: ts.TypeNode | undefined;
};

const directiveTags = (node: ts.Node): readonly ts.JSDocTag[] =>
  ts.getJSDocTags(node).filter((tag) => tag.tagName.text === DIRECTIVE_TAG);

const readDirectives = (
  sourceFile: ts.SourceFile,
  node: ts.Node,
  typeName: string,
  fieldName?: string
): Extracted<readonly RawDirective[]> => {
  const directives: RawDirective[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const tag of directiveTags(node)) {
    const location = getNodeLocation(sourceFile, tag);
    const tokens = tokenizeDirectiveText(
      ts.getTextOfJSDocComment(tag.comment) ?? "",
      location
    );
    if (tokens.ok) {
      directives.push(...tokens.value);
    } else {
      diagnostics.push(
        createDiagnostic("AW1001", "error", tokens.error, {
          location,
          typeName,
          fieldName,
        })
      );
    }
  }

  return { value: directives, diagnostics };
};

const memberName = (
  sourceFile: ts.SourceFile,
  name: ts.PropertyName
): string | undefined =>
  ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)
    ? name.text
    : ts.isPrivateIdentifier(name)
      ? undefined
      : name.getText(sourceFile);

const isInstanceProperty = (member: ts.ClassElement): member is ts.PropertyDeclaration =>
  ts.isPropertyDeclaration(member) &&
  !(ts.getCombinedModifierFlags(member) & ts.ModifierFlags.Static);

type MirrorBody = {
  readonly shape: MirrorShape;
  readonly members: readonly MemberNode[];
  readonly variants: readonly {
    readonly node: ts.TypeLiteralNode;
    readonly members: readonly MemberNode[];
  }[];
};

const propertySignatures = (members: ts.NodeArray<ts.TypeElement>): readonly MemberNode[] =>
  members.filter(ts.isPropertySignature).map((m) => ({ node: m, name: m.name, type: m.type }));

const structBody = (members: readonly MemberNode[]): MirrorBody => ({
  shape: members.length > 0 ? "named" : "unit",
  members,
  variants: [],
});

const membersOf = (node: MirrorCandidate): MirrorBody | undefined => {
  if (ts.isInterfaceDeclaration(node)) {
    return structBody(propertySignatures(node.members));
  }

  if (ts.isClassDeclaration(node)) {
    return structBody(
      node.members
        .filter(isInstanceProperty)
        .map((m) => ({ node: m, name: m.name, type: m.type }))
    );
  }

  const type = node.type;
  if (ts.isTypeLiteralNode(type)) {
    return structBody(propertySignatures(type.members));
  }

  if (ts.isTupleTypeNode(type)) {
    const members = type.elements.map((element) =>
      ts.isNamedTupleMember(element)
        ? { node: element, name: undefined, type: element.type }
        : { node: element, name: undefined, type: element }
    );
    return { shape: members.length > 0 ? "tuple" : "unit", members, variants: [] };
  }

  if (ts.isUnionTypeNode(type) && type.types.every(ts.isTypeLiteralNode)) {
    return {
      shape: "enum",
      members: [],
      variants: type.types.filter(ts.isTypeLiteralNode).map((variant) => ({
        node: variant,
        members: propertySignatures(variant.members),
      })),
    };
  }

  return undefined;
};

const isMirror = (node: MirrorCandidate): boolean => {
  if (directiveTags(node).length > 0) return true;
  const shaped = membersOf(node);
  if (!shaped) return false;
  return [...shaped.members, ...shaped.variants.flatMap((v) => v.members)].some(
    (m) => directiveTags(m.node).length > 0
  );
};

const readField = (
  sourceFile: ts.SourceFile,
  typeName: string,
  member: MemberNode,
  index: number
): Extracted<RawFieldDecl | undefined> => {
  const location = getNodeLocation(sourceFile, member.node);
  const name = member.name ? memberName(sourceFile, member.name) : String(index);

  if (name === undefined) {
    return {
      value: undefined,
      diagnostics: [
        createDiagnostic(
          "AW1001",
          "error",
          "private members cannot be mirror fields",
          { location, typeName }
        ),
      ],
    };
  }

  if (!member.type) {
    return {
      value: undefined,
      diagnostics: [
        createDiagnostic(
          "AW1003",
          "error",
          `member '${name}' has no declared type`,
          { location, typeName, fieldName: name },
          `annotate the member, e.g. ${name}: u8`
        ),
      ],
    };
  }

  const directives = readDirectives(sourceFile, member.node, typeName, name);
  return {
    value: {
      name,
      type: member.type.getText(sourceFile),
      directives: directives.value,
      location,
    },
    diagnostics: directives.diagnostics,
  };
};

const readFields = (
  sourceFile: ts.SourceFile,
  typeName: string,
  members: readonly MemberNode[]
): Extracted<readonly RawFieldDecl[]> => {
  const fields = members.map((member, index) => readField(sourceFile, typeName, member, index));
  return {
    value: fields.flatMap((field) => (field.value ? [field.value] : [])),
    diagnostics: fields.flatMap((field) => field.diagnostics),
  };
};

const unsupported = (
  sourceFile: ts.SourceFile,
  node: ts.Node,
  typeName: string,
  message: string
): Diagnostic =>
  createDiagnostic("AW1001", "error", message, {
    location: getNodeLocation(sourceFile, node),
    typeName,
  });

/**
 * Any diagnostic drops the declaration; its siblings are unaffected.
 */
const readTypeDecl = (
  sourceFile: ts.SourceFile,
  node: MirrorCandidate,
  typeName: string
): Extracted<RawTypeDecl | undefined> => {
  const shaped = membersOf(node);
  if (!shaped) {
    return {
      value: undefined,
      diagnostics: [
        unsupported(
          sourceFile,
          node,
          typeName,
          `type alias '${typeName}' must be an object literal, tuple, or union of object literal types to be a mirror`
        ),
      ],
    };
  }

  const directives = readDirectives(sourceFile, node, typeName);
  const fields = readFields(sourceFile, typeName, shaped.members);
  const variants = shaped.variants.map((variant): Extracted<RawVariantDecl> => {
    const variantFields = readFields(sourceFile, typeName, variant.members);
    return {
      value: {
        fields: variantFields.value,
        location: getNodeLocation(sourceFile, variant.node),
      },
      diagnostics: variantFields.diagnostics,
    };
  });
  const diagnostics = [
    ...directives.diagnostics,
    ...fields.diagnostics,
    ...variants.flatMap((variant) => variant.diagnostics),
  ];

  if (diagnostics.length > 0) {
    return { value: undefined, diagnostics };
  }

  const typeParameters = (node.typeParameters ?? []).map(
    (parameter): RawTypeParameter => ({
      name: parameter.name.text,
      ...(parameter.constraint ? { constraint: parameter.constraint.getText(sourceFile) } : {}),
      ...(parameter.default ? { default: parameter.default.getText(sourceFile) } : {}),
    })
  );

  return {
    value: {
      name: typeName,
      shape: shaped.shape,
      ...(typeParameters.length > 0 ? { typeParameters } : {}),
      directives: directives.value,
      fields: fields.value,
      ...(shaped.shape === "enum" ? { variants: variants.map((variant) => variant.value) } : {}),
      location: getNodeLocation(sourceFile, node.name ?? node),
    },
    diagnostics: [],
  };
};

const mirrorCandidate = (statement: ts.Statement): MirrorCandidate | undefined =>
  ts.isInterfaceDeclaration(statement) ||
  ts.isClassDeclaration(statement) ||
  ts.isTypeAliasDeclaration(statement)
    ? statement
    : undefined;

/**
 * Extract mirror declarations and name bindings from one source file.
 */
export const extractTypeDecls = (
  fileName: string,
  text: string
): SourceExtraction => {
  const sourceFile = ts.createSourceFile(
    fileName,
    text,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS
  );

  const decls: RawTypeDecl[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const statement of sourceFile.statements) {
    if (ts.isEnumDeclaration(statement) && directiveTags(statement).length > 0) {
      diagnostics.push(
        unsupported(
          sourceFile,
          statement,
          statement.name.text,
          "enum declarations cannot be mirrors; declare a union of object literal types with a tag property"
        )
      );
      continue;
    }

    const candidate = mirrorCandidate(statement);
    if (!candidate || !isMirror(candidate)) continue;

    const typeName = candidate.name?.text ?? "default";
    const extracted = readTypeDecl(sourceFile, candidate, typeName);
    diagnostics.push(...extracted.diagnostics);
    if (extracted.value) {
      decls.push(extracted.value);
    }
  }

  return {
    fileName,
    decls,
    references: collectReferences(sourceFile),
    diagnostics,
  };
};
