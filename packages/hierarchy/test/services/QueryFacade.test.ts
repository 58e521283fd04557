import { describe, it, expect } from "vitest";
import { silentLog } from "@codenav/core";
import { QueryFacade } from "../../src/core/services/QueryFacade.js";
import { CapabilityRegistry } from "../../src/core/registry/CapabilityRegistry.js";
import { INDEX_NOT_READY_MESSAGE, IndexNotReadyError } from "../../src/core/errors.js";
import type { CodeModel, SupertypeRef } from "../../src/core/ports/CodeModel.js";
import { InMemoryCodeModel, type DeclarationSpec } from "../../src/infrastructure/memory/InMemoryCodeModel.js";
import { registerLanguageFamilies } from "../../src/infrastructure/providers/LanguageFamilies.js";
import { aborted } from "../helpers/context.js";
import { zooDeclarations, zooModel } from "../helpers/models.js";

/** Reports ready, then fails once a query reaches the supertype index. */
class StaleIndexModel extends InMemoryCodeModel {
  declaredSupertypes(): SupertypeRef[] {
    throw new IndexNotReadyError();
  }
}

function facadeFor(model: CodeModel): QueryFacade {
  const registry = new CapabilityRegistry({ log: silentLog });
  registerLanguageFamilies(registry, model);
  return new QueryFacade(model, registry);
}

describe("QueryFacade", () => {
  describe("starting element", () => {
    it("resolves a position to the innermost declaration", () => {
      const facade = facadeFor(zooModel());
      const result = facade.superMethods({ file: "zoo/Dog.java", line: 6, column: 9 });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.method.containingClass).toBe("zoo.Dog");
        expect(result.value.hierarchy.map((entry) => entry.containingClass)).toEqual(["zoo.Animal"]);
      }
    });

    it("resolves a qualified name", () => {
      const facade = facadeFor(zooModel());
      const result = facade.typeHierarchy({ qualifiedName: "zoo.Puppy" });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.supertypes.map((node) => node.name)).toEqual(["Dog"]);
        expect(result.value.supertypes[0].supertypes?.map((node) => node.name)).toEqual(["Animal", "Runnable"]);
      }
    });

    it("reports a position with no element", () => {
      const facade = facadeFor(zooModel());

      expect(facade.typeHierarchy({ file: "zoo/Dog.java", line: 99, column: 1 })).toEqual({
        ok: false,
        error: { code: "NO_ELEMENT_AT_POSITION", message: "No element found at position zoo/Dog.java:99:1" },
      });
    });

    it("reports an unknown qualified name", () => {
      const facade = facadeFor(zooModel());

      expect(facade.findImplementations({ qualifiedName: "zoo.Cat" })).toEqual({
        ok: false,
        error: { code: "NO_ELEMENT_AT_POSITION", message: "No element found with name 'zoo.Cat'" },
      });
    });
  });

  describe("provider selection", () => {
    it("reports a language without providers", () => {
      const model = new InMemoryCodeModel([
        ...zooDeclarations,
        { id: "Config", name: "Config", kind: "struct", language: "rust", file: "src/config.rs", line: 3, endLine: 9 },
      ]);
      const facade = facadeFor(model);

      expect(facade.typeHierarchy({ file: "src/config.rs", line: 4, column: 1 })).toEqual({
        ok: false,
        error: {
          code: "NO_PROVIDER_FOR_LANGUAGE",
          message: "No type hierarchy provider available for language: rust. Supported languages: java, kotlin",
          language: "rust",
          supportedLanguages: ["java", "kotlin"],
        },
      });
    });

    it("reports an element that is neither a type nor inside one", () => {
      const model = new InMemoryCodeModel([
        { id: "main", name: "main", kind: "function", language: "kotlin", file: "Main.kt", line: 1, endLine: 3 },
      ]);
      const facade = facadeFor(model);

      expect(facade.typeHierarchy({ file: "Main.kt", line: 2, column: 5 })).toEqual({
        ok: false,
        error: { code: "NOT_A_TYPE_OR_METHOD", message: "Element at the given location is not a type" },
      });
      expect(facade.superMethods({ qualifiedName: "main" })).toEqual({
        ok: false,
        error: { code: "NOT_A_TYPE_OR_METHOD", message: "Element at the given location is not a method" },
      });
    });
  });

  describe("call hierarchy", () => {
    it("clamps the requested depth", () => {
      const facade = facadeFor(zooModel());
      const deep = facade.callHierarchy({ qualifiedName: "zoo.Dog.speak" }, "callers", 9);
      const shallow = facade.callHierarchy({ qualifiedName: "zoo.Dog.speak" }, "callers", 0);

      expect(deep.ok && deep.value.depth).toBe(5);
      expect(shallow.ok && shallow.value.depth).toBe(1);
    });

    it("uses the default depth for a non-finite request", () => {
      const facade = facadeFor(zooModel());
      const result = facade.callHierarchy({ qualifiedName: "zoo.Dog.speak" }, "callers", Number.NaN);

      expect(result.ok && result.value.depth).toBe(3);
    });

    it("defaults to depth 3", () => {
      const facade = facadeFor(zooModel());
      const result = facade.callHierarchy({ qualifiedName: "zoo.Dog.speak" }, "callers");

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.depth).toBe(3);
        expect(result.value.calls).toEqual([
          { name: "Dog.run()", file: "zoo/Dog.java", line: 10, language: "java" },
        ]);
      }
    });
  });

  describe("implementations", () => {
    it("lists overriding methods of a method", () => {
      const facade = facadeFor(zooModel());
      const result = facade.findImplementations({ qualifiedName: "zoo.Animal.speak" });

      expect(result).toEqual({
        ok: true,
        value: {
          element: "zoo.Animal.speak",
          implementations: [{ name: "Dog.speak", file: "zoo/Dog.java", line: 5, kind: "METHOD", language: "java" }],
        },
      });
    });

    it("lists subtypes of a type", () => {
      const facade = facadeFor(zooModel());
      const result = facade.findImplementations({ file: "zoo/Runnable.java", line: 3, column: 1 });

      expect(result).toEqual({
        ok: true,
        value: {
          element: "zoo.Runnable",
          implementations: [
            { name: "zoo.Dog", file: "zoo/Dog.java", line: 3, kind: "CLASS", language: "java" },
            { name: "zoo.Puppy", file: "zoo/Puppy.java", line: 3, kind: "CLASS", language: "java" },
          ],
        },
      });
    });
  });

  describe("symbol search", () => {
    it("rejects a blank query", () => {
      const facade = facadeFor(zooModel());

      expect(facade.searchSymbols("   ")).toEqual({
        ok: false,
        error: { code: "INVALID_ARGUMENT", message: "Query cannot be empty" },
      });
    });

    it("merges providers without duplicates", () => {
      const facade = facadeFor(zooModel());
      const result = facade.searchSymbols("dog");

      expect(result.ok && result.value.map((match) => `${match.name}@${match.file}`)).toEqual(["Dog@zoo/Dog.java"]);
    });

    it("aggregates matches across language families", () => {
      const extra: DeclarationSpec = {
        id: "dog-walker",
        name: "DogWalker",
        kind: "class",
        language: "python",
        file: "walkers.py",
        line: 1,
      };
      const facade = facadeFor(new InMemoryCodeModel([...zooDeclarations, extra]));
      const result = facade.searchSymbols("dog");

      expect(result.ok && result.value.map((match) => match.name)).toEqual(["Dog", "DogWalker"]);
    });

    it("clamps the limit", () => {
      const facade = facadeFor(zooModel());
      const result = facade.searchSymbols("a", { limit: 0 });

      expect(result.ok && result.value).toHaveLength(1);
    });

    it("uses the default limit for a non-finite request", () => {
      const items: DeclarationSpec[] = Array.from({ length: 30 }, (_, index) => ({
        id: `item-${index}`,
        name: `Item${index}`,
        kind: "class",
        language: "java",
        file: `src/Item${index}.java`,
        line: 1,
      }));
      const facade = facadeFor(new InMemoryCodeModel(items));
      const result = facade.searchSymbols("item", { limit: Number.NaN });

      expect(result.ok && result.value).toHaveLength(25);
    });

    it("returns only symbols of the requested language", () => {
      const facade = facadeFor(
        new InMemoryCodeModel([
          { id: "dog-java", name: "DogJava", kind: "class", language: "java", file: "zoo/DogJava.java", line: 1 },
          { id: "dog-kt", name: "DogKt", kind: "class", language: "kotlin", file: "zoo/DogKt.kt", line: 1 },
        ])
      );

      const kotlin = facade.searchSymbols("dog", { language: "kotlin" });
      const java = facade.searchSymbols("dog", { language: "java" });

      expect(kotlin.ok && kotlin.value.map((match) => `${match.name}/${match.language}`)).toEqual(["DogKt/kotlin"]);
      expect(java.ok && java.value.map((match) => `${match.name}/${match.language}`)).toEqual(["DogJava/java"]);
    });

    it("filters by language", () => {
      const facade = facadeFor(zooModel());

      expect(facade.searchSymbols("dog", { language: "kotlin" })).toEqual({ ok: true, value: [] });
      expect(facade.searchSymbols("dog", { language: "python" })).toEqual({
        ok: false,
        error: {
          code: "NO_PROVIDER_FOR_LANGUAGE",
          message: "No symbol search provider available for language: python. Supported languages: java, kotlin",
          language: "python",
          supportedLanguages: ["java", "kotlin"],
        },
      });
    });
  });

  describe("failures as values", () => {
    it("reports a model that is still indexing", () => {
      const model = zooModel();
      const facade = facadeFor(model);
      model.setReady(false);

      expect(facade.typeHierarchy({ qualifiedName: "zoo.Dog" })).toEqual({
        ok: false,
        error: { code: "INDEX_NOT_READY", message: INDEX_NOT_READY_MESSAGE },
      });
      expect(facade.searchSymbols("dog")).toEqual({
        ok: false,
        error: { code: "INDEX_NOT_READY", message: INDEX_NOT_READY_MESSAGE },
      });
    });

    it("reports an index that goes stale during a query", () => {
      const facade = facadeFor(new StaleIndexModel(zooDeclarations));

      expect(facade.typeHierarchy({ qualifiedName: "zoo.Dog" })).toEqual({
        ok: false,
        error: { code: "INDEX_NOT_READY", message: INDEX_NOT_READY_MESSAGE },
      });
    });

    it("reports cancellation", () => {
      const facade = facadeFor(zooModel());
      const signal = aborted(new Error("client went away"));

      expect(facade.typeHierarchy({ qualifiedName: "zoo.Dog" }, { signal })).toEqual({
        ok: false,
        error: { code: "CANCELLED", message: "Query was cancelled: client went away" },
      });
    });
  });

  describe("navigation", () => {
    it("lists usages of a declaration with their containers", () => {
      const facade = facadeFor(zooModel());

      expect(facade.findUsages({ qualifiedName: "zoo.Dog.speak" })).toEqual({
        ok: true,
        value: {
          element: "zoo.Dog.speak",
          usages: [{ file: "zoo/Dog.java", line: 11, container: "zoo.Dog.run", language: "java" }],
          totalCount: 1,
        },
      });
    });

    it("finds usages of the declaration a call refers to", () => {
      const facade = facadeFor(zooModel());
      const result = facade.findUsages({ file: "zoo/Dog.java", line: 11, column: 9 });

      expect(result.ok && result.value.element).toBe("zoo.Dog.speak");
    });

    it("reports a declaration without usages", () => {
      const facade = facadeFor(zooModel());

      expect(facade.findUsages({ qualifiedName: "zoo.Puppy" })).toEqual({
        ok: true,
        value: { element: "zoo.Puppy", usages: [], totalCount: 0 },
      });
    });

    it("goes from a call to the called declaration", () => {
      const facade = facadeFor(zooModel());

      expect(facade.goToDefinition({ file: "zoo/Dog.java", line: 11, column: 9 })).toEqual({
        ok: true,
        value: {
          name: "speak",
          qualifiedName: "zoo.Dog.speak",
          kind: "method",
          file: "zoo/Dog.java",
          line: 5,
          language: "java",
        },
      });
    });

    it("treats a position on a declaration as its own definition", () => {
      const facade = facadeFor(zooModel());
      const result = facade.goToDefinition({ file: "zoo/Dog.java", line: 18, column: 1 });

      expect(result.ok && result.value).toMatchObject({ name: "Dog", qualifiedName: "zoo.Dog", kind: "class", line: 3 });
    });

    it("reports a position outside every declaration", () => {
      const facade = facadeFor(zooModel());

      expect(facade.goToDefinition({ file: "zoo/Dog.java", line: 40, column: 1 })).toEqual({
        ok: false,
        error: { code: "NO_ELEMENT_AT_POSITION", message: "No element found at position zoo/Dog.java:40:1" },
      });
    });

    it("reports a model that is still indexing", () => {
      const model = zooModel();
      const facade = facadeFor(model);
      model.setReady(false);

      expect(facade.findUsages({ qualifiedName: "zoo.Dog.speak" })).toEqual({
        ok: false,
        error: { code: "INDEX_NOT_READY", message: INDEX_NOT_READY_MESSAGE },
      });
      expect(facade.indexStatus()).toEqual({ ready: false, languages: ["java", "kotlin"] });
    });

    it("reports index readiness and the languages served", () => {
      const facade = facadeFor(zooModel());

      expect(facade.indexStatus()).toEqual({ ready: true, languages: ["java", "kotlin"] });
    });
  });

  it("lists supported languages per capability", () => {
    const facade = facadeFor(zooModel());

    expect(facade.supportedLanguages().superMethods).toEqual(["java", "kotlin"]);
  });
});
