import * as z from "zod/v4";
import { Err, Ok, type Result } from "@codenav/core";
import { QueryErrors, type QueryError } from "../core/errors.js";
import type { ElementRef } from "../core/model.js";

export const TypeKindSchema = z.enum([
  "CLASS",
  "INTERFACE",
  "ABSTRACT_CLASS",
  "ENUM",
  "ANNOTATION",
  "RECORD",
  "STRUCT",
  "TRAIT",
  "PROTOCOL",
  "OBJECT",
]);

export const SymbolKindSchema = z.enum([
  "CLASS",
  "INTERFACE",
  "ABSTRACT_CLASS",
  "ENUM",
  "ANNOTATION",
  "RECORD",
  "STRUCT",
  "TRAIT",
  "PROTOCOL",
  "OBJECT",
  "METHOD",
  "FUNCTION",
  "CONSTRUCTOR",
  "FIELD",
  "PROPERTY",
  "VARIABLE",
  "CONSTANT",
]);

const TypeNodeFields = {
  name: z.string(),
  qualifiedName: z.string().nullable(),
  file: z.string().nullable(),
  line: z.number().nullable(),
  kind: TypeKindSchema,
  language: z.string(),
};

export interface TypeTreeNode {
  name: string;
  qualifiedName: string | null;
  file: string | null;
  line: number | null;
  kind: z.infer<typeof TypeKindSchema>;
  language: string;
  supertypes?: TypeTreeNode[];
}

export const TypeNodeSchema: z.ZodType<TypeTreeNode> = z.object({
  ...TypeNodeFields,
  get supertypes() {
    return z.array(TypeNodeSchema).optional();
  },
});

export interface CallTreeNode {
  name: string;
  file: string;
  line: number;
  language: string;
  children?: CallTreeNode[];
}

export const CallNodeSchema: z.ZodType<CallTreeNode> = z.object({
  name: z.string(),
  file: z.string(),
  line: z.number(),
  language: z.string(),
  get children() {
    return z.array(CallNodeSchema).optional();
  },
});

export const MethodInfoSchema = z.object({
  name: z.string(),
  signature: z.string(),
  containingClass: z.string().nullable(),
  file: z.string().nullable(),
  line: z.number().nullable(),
  language: z.string(),
});

export const SuperMethodEntrySchema = z.object({
  name: z.string(),
  signature: z.string(),
  containingClass: z.string(),
  containingClassKind: TypeKindSchema,
  file: z.string().nullable(),
  line: z.number().nullable(),
  isInterface: z.boolean(),
  depth: z.number(),
  language: z.string(),
});

export const SymbolMatchSchema = z.object({
  name: z.string(),
  qualifiedName: z.string().nullable(),
  kind: SymbolKindSchema,
  file: z.string(),
  line: z.number(),
  containerName: z.string().nullable(),
  language: z.string(),
});

export const ImplementationEntrySchema = z.object({
  name: z.string(),
  file: z.string(),
  line: z.number(),
  kind: SymbolKindSchema,
  language: z.string(),
});

export const UsageEntrySchema = z.object({
  file: z.string(),
  line: z.number(),
  container: z.string().nullable(),
  language: z.string(),
});

export const DefinitionSchema = z.object({
  name: z.string(),
  qualifiedName: z.string().nullable(),
  kind: z.string(),
  file: z.string().nullable(),
  line: z.number().nullable(),
  language: z.string(),
});

/** Fields every failure payload may carry */
export const FailureFields = {
  success: z.boolean(),
  error: z.string().optional(),
  code: z.string().optional(),
};

/**
 * Where a query starts. Either the full position or a qualified name.
 */
export const ElementRefInput = {
  file: z.string().optional().describe("Workspace-relative or absolute path of the file"),
  line: z.number().int().optional().describe("Line number (1-indexed)"),
  column: z.number().int().optional().describe("Column number (1-indexed)"),
  qualifiedName: z
    .string()
    .optional()
    .describe("Fully-qualified name, e.g. com.example.Service or Service.handle; used instead of a position"),
};

export interface ElementRefArgs {
  file?: string;
  line?: number;
  column?: number;
  qualifiedName?: string;
}

export function toElementRef(args: ElementRefArgs): Result<ElementRef, QueryError> {
  if (args.qualifiedName !== undefined && args.qualifiedName.trim() !== "") {
    return Ok({ qualifiedName: args.qualifiedName.trim() });
  }
  if (args.file === undefined || args.line === undefined || args.column === undefined) {
    return Err(QueryErrors.invalidArgument("Provide file, line and column, or a qualifiedName"));
  }
  return Ok({ file: args.file, line: args.line, column: args.column });
}

/**
 * Structured extras for a failed query: its code, plus the supported
 * languages when no provider matched.
 */
export function errorDetails(error: QueryError): Record<string, unknown> {
  if (error.code === "NO_PROVIDER_FOR_LANGUAGE") {
    return { code: error.code, language: error.language, supportedLanguages: error.supportedLanguages };
  }
  return { code: error.code };
}
