/**
 * JSON code-model snapshots: a declaration table exported by some other
 * indexer, loaded into an {@link InMemoryCodeModel}.
 */

import { readFileSync } from "node:fs";
import * as z from "zod/v4";
import { Err, Ok, type Result } from "@codenav/core";
import { InMemoryCodeModel } from "./InMemoryCodeModel.js";

const DeclarationKindSchema = z.enum([
  "class",
  "abstract_class",
  "interface",
  "enum",
  "annotation",
  "record",
  "struct",
  "trait",
  "protocol",
  "object",
  "method",
  "constructor",
  "function",
  "field",
  "property",
  "variable",
  "constant",
  "other",
]);

const SupertypeSchema = z.object({
  name: z.string().min(1),
  qualifiedName: z.string().optional(),
  relation: z.enum(["superclass", "interface"]).optional(),
  target: z.string().optional(),
});

const CallSchema = z.object({
  callee: z.string().min(1),
  target: z.string().optional(),
  line: z.number().int().positive().optional(),
});

const DeclarationSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  kind: DeclarationKindSchema,
  language: z.string().min(1),
  qualifiedName: z.string().optional(),
  file: z.string().optional(),
  line: z.number().int().positive().optional(),
  endLine: z.number().int().positive().optional(),
  parent: z.string().optional(),
  supertypes: z.array(SupertypeSchema).optional(),
  parameters: z.array(z.object({ name: z.string(), type: z.string().nullable() })).optional(),
  returnType: z.string().optional(),
  overrides: z.array(z.string()).optional(),
  calls: z.array(CallSchema).optional(),
  external: z.boolean().optional(),
});

export const SnapshotSchema = z
  .object({
    languages: z.array(z.string().min(1)).optional(),
    declarations: z.array(DeclarationSchema),
  })
  .superRefine((snapshot, ctx) => {
    const ids = new Set<string>();
    snapshot.declarations.forEach((declaration, index) => {
      if (ids.has(declaration.id)) {
        ctx.addIssue({
          code: "custom",
          message: `Duplicate declaration id: ${declaration.id}`,
          input: declaration.id,
          path: ["declarations", index, "id"],
        });
      }
      ids.add(declaration.id);
    });
    const parents = new Map(snapshot.declarations.map((declaration) => [declaration.id, declaration.parent]));
    snapshot.declarations.forEach((declaration, index) => {
      if (declaration.parent === undefined) return;
      if (!ids.has(declaration.parent)) {
        ctx.addIssue({
          code: "custom",
          message: `Unknown parent: ${declaration.parent}`,
          input: declaration.parent,
          path: ["declarations", index, "parent"],
        });
      } else if (reachesCycle(declaration.id, parents)) {
        ctx.addIssue({
          code: "custom",
          message: `Parent cycle at ${declaration.id}`,
          input: declaration.parent,
          path: ["declarations", index, "parent"],
        });
      }
    });
  });

/** Whether following `parent` links from `id` ever revisits a declaration. */
function reachesCycle(id: string, parents: ReadonlyMap<string, string | undefined>): boolean {
  const seen = new Set<string>([id]);
  let current = parents.get(id);
  while (current !== undefined) {
    if (seen.has(current)) return true;
    seen.add(current);
    current = parents.get(current);
  }
  return false;
}

export type Snapshot = z.infer<typeof SnapshotSchema>;

export function parseSnapshot(data: unknown): Result<InMemoryCodeModel, Error> {
  const parsed = SnapshotSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return Err(new Error(`Invalid code model snapshot: ${issues}`));
  }
  const { declarations, languages } = parsed.data;
  return Ok(new InMemoryCodeModel(declarations, { languages }));
}

export function loadSnapshot(path: string): Result<InMemoryCodeModel, Error> {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    return Err(new Error(`Could not read code model snapshot ${path}: ${reason}`));
  }
  return parseSnapshot(data);
}
