import { describe, it, expect } from "vitest";
import { QueryCancelledError } from "@codenav/core";
import { resolveTypeHierarchy } from "../../src/core/algorithms/typeHierarchy.js";
import { InMemoryCodeModel, type DeclarationSpec } from "../../src/infrastructure/memory/InMemoryCodeModel.js";
import { jvmTraits } from "../../src/infrastructure/providers/families/jvm.js";
import { pythonTraits } from "../../src/infrastructure/providers/families/python.js";
import { aborted, named, traversal } from "../helpers/context.js";
import { zooModel } from "../helpers/models.js";

function javaType(id: string, extra: Partial<DeclarationSpec> = {}): DeclarationSpec {
  return { id, name: id, kind: "class", language: "java", file: `${id}.java`, line: 1, ...extra };
}

describe("resolveTypeHierarchy", () => {
  it("builds the supertype tree and subtype list, leaving out the implicit root", () => {
    const model = zooModel();
    const result = resolveTypeHierarchy(named(model, "zoo.Dog"), traversal(model, jvmTraits));

    expect(result.node).toEqual({
      name: "Dog",
      qualifiedName: "zoo.Dog",
      file: "zoo/Dog.java",
      line: 3,
      kind: "CLASS",
      language: "java",
    });
    expect(result.supertypes).toEqual([
      {
        name: "Animal",
        qualifiedName: "zoo.Animal",
        file: "zoo/Animal.java",
        line: 3,
        kind: "CLASS",
        language: "java",
        supertypes: [],
      },
      {
        name: "Runnable",
        qualifiedName: "zoo.Runnable",
        file: "zoo/Runnable.java",
        line: 3,
        kind: "INTERFACE",
        language: "java",
        supertypes: [],
      },
    ]);
    expect(result.subtypes).toEqual([
      {
        name: "Puppy",
        qualifiedName: "zoo.Puppy",
        file: "zoo/Puppy.java",
        line: 3,
        kind: "CLASS",
        language: "java",
      },
    ]);
  });

  it("lists transitive subtypes breadth-first", () => {
    const model = zooModel();
    const result = resolveTypeHierarchy(named(model, "zoo.Animal"), traversal(model, jvmTraits));

    expect(result.supertypes).toEqual([]);
    expect(result.subtypes.map((node) => node.name)).toEqual(["Dog", "Puppy"]);
  });

  it("terminates on cyclic declarations", () => {
    const model = new InMemoryCodeModel([
      javaType("A", { supertypes: [{ name: "B", target: "B" }] }),
      javaType("B", { supertypes: [{ name: "A", target: "A" }] }),
    ]);
    const result = resolveTypeHierarchy(named(model, "A"), traversal(model, jvmTraits));

    expect(result.supertypes).toHaveLength(1);
    expect(result.supertypes[0].name).toBe("B");
    expect(result.supertypes[0].supertypes).toEqual([]);
    expect(result.subtypes.map((node) => node.name)).toEqual(["B"]);
  });

  it("expands a diamond's shared ancestor once", () => {
    const model = new InMemoryCodeModel([
      javaType("Base", { kind: "interface" }),
      javaType("Top", { kind: "interface", supertypes: [{ name: "Base", relation: "interface", target: "Base" }] }),
      javaType("Left", { kind: "interface", supertypes: [{ name: "Top", relation: "interface", target: "Top" }] }),
      javaType("Right", { kind: "interface", supertypes: [{ name: "Top", relation: "interface", target: "Top" }] }),
      javaType("Bottom", {
        supertypes: [
          { name: "Left", relation: "interface", target: "Left" },
          { name: "Right", relation: "interface", target: "Right" },
        ],
      }),
    ]);
    const [left, right] = resolveTypeHierarchy(named(model, "Bottom"), traversal(model, jvmTraits)).supertypes;

    expect(left.supertypes?.map((node) => node.name)).toEqual(["Top"]);
    expect(left.supertypes?.[0].supertypes?.map((node) => node.name)).toEqual(["Base"]);
    expect(right.supertypes?.map((node) => node.name)).toEqual(["Top"]);
    expect(right.supertypes?.[0].supertypes).toEqual([]);
  });

  it("reports unresolved supertypes as leaves without a location", () => {
    const model = new InMemoryCodeModel([
      javaType("Widget", {
        supertypes: [
          { name: "ExternalBase", qualifiedName: "lib.ExternalBase" },
          { name: "Listener", relation: "interface" },
        ],
      }),
    ]);
    const result = resolveTypeHierarchy(named(model, "Widget"), traversal(model, jvmTraits));

    expect(result.supertypes).toEqual([
      {
        name: "ExternalBase",
        qualifiedName: "lib.ExternalBase",
        file: null,
        line: null,
        kind: "CLASS",
        language: "java",
        supertypes: [],
      },
      {
        name: "Listener",
        qualifiedName: null,
        file: null,
        line: null,
        kind: "INTERFACE",
        language: "java",
        supertypes: [],
      },
    ]);
  });

  it("omits python's object root even when it is not declared", () => {
    const model = new InMemoryCodeModel([
      {
        id: "Model",
        name: "Model",
        kind: "class",
        language: "python",
        file: "models.py",
        line: 4,
        supertypes: [{ name: "object" }],
      },
    ]);
    const result = resolveTypeHierarchy(named(model, "Model"), traversal(model, pythonTraits));

    expect(result.supertypes).toEqual([]);
  });

  it("stops at the configured type depth", () => {
    const chain = ["C0", "C1", "C2", "C3"].map((id, index, ids) =>
      javaType(id, index + 1 < ids.length ? { supertypes: [{ name: ids[index + 1], target: ids[index + 1] }] } : {})
    );
    const model = new InMemoryCodeModel(chain);
    const [c1] = resolveTypeHierarchy(named(model, "C0"), traversal(model, jvmTraits, { maxTypeDepth: 2 })).supertypes;

    expect(c1.name).toBe("C1");
    expect(c1.supertypes?.map((node) => node.name)).toEqual(["C2"]);
    expect(c1.supertypes?.[0].supertypes).toEqual([]);
  });

  it("caps the subtype list", () => {
    const model = new InMemoryCodeModel([
      javaType("Base"),
      javaType("S1", { supertypes: [{ name: "Base", target: "Base" }] }),
      javaType("S2", { supertypes: [{ name: "Base", target: "Base" }] }),
      javaType("S3", { supertypes: [{ name: "Base", target: "Base" }] }),
    ]);
    const result = resolveTypeHierarchy(named(model, "Base"), traversal(model, jvmTraits, { maxSubtypes: 2 }));

    expect(result.subtypes.map((node) => node.name)).toEqual(["S1", "S2"]);
  });

  it("throws when the signal is already aborted", () => {
    const model = zooModel();
    const ctx = traversal(model, jvmTraits, {}, aborted());

    expect(() => resolveTypeHierarchy(named(model, "zoo.Dog"), ctx)).toThrow(QueryCancelledError);
  });
});
