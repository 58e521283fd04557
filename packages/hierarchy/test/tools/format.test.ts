import { describe, it, expect } from "vitest";
import { QueryErrors } from "../../src/core/errors.js";
import type { CallNode, TypeNode } from "../../src/core/model.js";
import { errorDetails, toElementRef } from "../../src/tools/schemas.js";
import { formatLocation } from "../../src/tools/types.js";
import {
  formatCallHierarchy,
  formatDefinition,
  formatImplementations,
  formatIndexStatus,
  formatSuperMethods,
  formatSupportedLanguages,
  formatSymbolMatches,
  formatTypeHierarchy,
  formatUsages,
} from "../../src/tools/index.js";

const dog: TypeNode = {
  name: "Dog",
  qualifiedName: "zoo.Dog",
  file: "zoo/Dog.java",
  line: 3,
  kind: "CLASS",
  language: "java",
};

describe("formatLocation", () => {
  it("renders file and line", () => {
    expect(formatLocation("a.py", 4)).toBe("a.py:4");
  });

  it("drops a missing line", () => {
    expect(formatLocation("a.py", null)).toBe("a.py");
  });

  it("marks elements without a file as external", () => {
    expect(formatLocation(null, 9)).toBe("(external)");
  });
});

describe("toElementRef", () => {
  it("prefers a qualified name and trims it", () => {
    const ref = toElementRef({ file: "a.py", line: 1, column: 1, qualifiedName: "  app.A  " });
    expect(ref).toEqual({ ok: true, value: { qualifiedName: "app.A" } });
  });

  it("falls back to the position when the name is blank", () => {
    const ref = toElementRef({ file: "a.py", line: 2, column: 5, qualifiedName: " " });
    expect(ref).toEqual({ ok: true, value: { file: "a.py", line: 2, column: 5 } });
  });

  it("rejects an incomplete position", () => {
    const ref = toElementRef({ file: "a.py", line: 2 });
    expect(ref).toEqual({
      ok: false,
      error: { code: "INVALID_ARGUMENT", message: "Provide file, line and column, or a qualifiedName" },
    });
  });
});

describe("errorDetails", () => {
  it("carries the code", () => {
    expect(errorDetails(QueryErrors.indexNotReady())).toEqual({ code: "INDEX_NOT_READY" });
  });

  it("adds language details for a missing provider", () => {
    const error = QueryErrors.noProvider("type hierarchy", "rust", ["java", "kotlin"]);
    expect(errorDetails(error)).toEqual({
      code: "NO_PROVIDER_FOR_LANGUAGE",
      language: "rust",
      supportedLanguages: ["java", "kotlin"],
    });
  });
});

describe("formatTypeHierarchy", () => {
  it("renders nested supertypes and the subtype list", () => {
    const animal: TypeNode = {
      name: "Animal",
      qualifiedName: "zoo.Animal",
      file: "zoo/Animal.java",
      line: 3,
      kind: "ABSTRACT_CLASS",
      language: "java",
      supertypes: [{ name: "Base", qualifiedName: null, file: null, line: null, kind: "CLASS", language: "java" }],
    };
    const runnable: TypeNode = {
      name: "Runnable",
      qualifiedName: "zoo.Runnable",
      file: "zoo/Runnable.java",
      line: 3,
      kind: "INTERFACE",
      language: "java",
    };
    const puppy: TypeNode = { ...dog, name: "Puppy", qualifiedName: "zoo.Puppy", file: "zoo/Puppy.java" };

    const { text, data } = formatTypeHierarchy({ node: dog, supertypes: [animal, runnable], subtypes: [puppy] });

    expect(text.split("\n")).toEqual([
      "# Type hierarchy: zoo.Dog",
      "",
      "**Kind:** CLASS",
      "**Location:** zoo/Dog.java:3",
      "",
      "## Supertypes",
      "- zoo.Animal (ABSTRACT_CLASS) zoo/Animal.java:3",
      "  - Base (CLASS) (external)",
      "- zoo.Runnable (INTERFACE) zoo/Runnable.java:3",
      "",
      "## Subtypes (1)",
      "- zoo.Puppy (CLASS) zoo/Puppy.java:3",
    ]);
    expect(data.subtypes).toEqual([puppy]);
  });

  it("marks empty sections", () => {
    const { text } = formatTypeHierarchy({ node: dog, supertypes: [], subtypes: [] });
    expect(text.split("\n").slice(5)).toEqual(["## Supertypes", "(none)", "", "## Subtypes (0)", "(none)"]);
  });
});

describe("formatCallHierarchy", () => {
  const target: CallNode = { name: "C.target", file: "app.py", line: 23, language: "python" };

  it("renders callers as a tree", () => {
    const calls: CallNode[] = [
      {
        name: "B.g",
        file: "app.py",
        line: 13,
        language: "python",
        children: [{ name: "A.f", file: "app.py", line: 2, language: "python" }],
      },
    ];
    const { text, data } = formatCallHierarchy({ node: target, direction: "callers", depth: 2, calls });

    expect(text.split("\n")).toEqual([
      "# Callers of C.target",
      "",
      "**Location:** app.py:23",
      "**Depth:** 2",
      "",
      "- B.g app.py:13",
      "  - A.f app.py:2",
    ]);
    expect(data.direction).toBe("callers");
  });

  it("reports an empty callee list", () => {
    const { text } = formatCallHierarchy({ node: target, direction: "callees", depth: 3, calls: [] });
    expect(text.split("\n")[0]).toBe("# Calls from C.target");
    expect(text.split("\n").at(-1)).toBe("No calls found.");
  });
});

describe("formatSuperMethods", () => {
  const method = {
    name: "run",
    signature: "run(): void",
    containingClass: "Dog",
    file: "zoo/Dog.java",
    line: 10,
    language: "java",
  };

  it("numbers entries by depth and flags interfaces", () => {
    const { text } = formatSuperMethods({
      method,
      totalCount: 1,
      hierarchy: [
        {
          name: "run",
          signature: "run(): void",
          containingClass: "Runnable",
          containingClassKind: "INTERFACE",
          file: "zoo/Runnable.java",
          line: 4,
          isInterface: true,
          depth: 1,
          language: "java",
        },
      ],
    });

    expect(text.split("\n")).toEqual([
      "# Super methods of Dog.run",
      "",
      "**Signature:** `run(): void`",
      "",
      "Found 1 super method(s):",
      "",
      "1. Runnable.run [interface] `run(): void` zoo/Runnable.java:4",
    ]);
  });

  it("says when nothing is overridden", () => {
    const { text } = formatSuperMethods({ method: { ...method, containingClass: null }, hierarchy: [], totalCount: 0 });
    expect(text.split("\n")).toEqual([
      "# Super methods of run",
      "",
      "**Signature:** `run(): void`",
      "",
      "This method does not override anything.",
    ]);
  });
});

describe("formatImplementations", () => {
  it("lists implementations", () => {
    const { text } = formatImplementations({
      element: "Animal.speak",
      implementations: [{ name: "Dog.speak", file: "zoo/Dog.java", line: 5, kind: "METHOD", language: "java" }],
    });
    expect(text).toBe("# Implementations of Animal.speak\n\n- Dog.speak (METHOD) zoo/Dog.java:5");
  });

  it("reports none", () => {
    const { text } = formatImplementations({ element: "Puppy", implementations: [] });
    expect(text).toBe("# Implementations of Puppy\n\nNo implementations found.");
  });
});

describe("formatSymbolMatches", () => {
  it("lists matches with their container", () => {
    const { text, data } = formatSymbolMatches("spk", [
      {
        name: "speak",
        qualifiedName: "zoo.Dog.speak",
        kind: "METHOD",
        file: "zoo/Dog.java",
        line: 5,
        containerName: "Dog",
        language: "java",
      },
      {
        name: "Speaker",
        qualifiedName: null,
        kind: "INTERFACE",
        file: "talk.py",
        line: 1,
        containerName: null,
        language: "python",
      },
    ]);

    expect(text.split("\n")).toEqual([
      '# Symbols matching "spk"',
      "",
      "Found 2 match(es):",
      "",
      "- **speak** (METHOD) in Dog zoo/Dog.java:5",
      "- **Speaker** (INTERFACE) talk.py:1",
    ]);
    expect(data.query).toBe("spk");
  });

  it("reports no matches", () => {
    expect(formatSymbolMatches("zzz", []).text).toBe("No symbols found matching: zzz");
  });
});

describe("formatSupportedLanguages", () => {
  it("lists every capability", () => {
    const { text } = formatSupportedLanguages({
      typeHierarchy: ["java", "kotlin"],
      callHierarchy: ["java", "kotlin"],
      superMethods: ["python"],
      symbolSearch: [],
      implementations: ["go"],
    });

    expect(text.split("\n")).toEqual([
      "# Supported languages",
      "",
      "- **type hierarchy:** java, kotlin",
      "- **call hierarchy:** java, kotlin",
      "- **super methods:** python",
      "- **symbol search:** none",
      "- **implementations:** go",
    ]);
  });
});

describe("formatUsages", () => {
  it("groups usages by file", () => {
    const { text, data } = formatUsages({
      element: "zoo.Dog.speak",
      usages: [
        { file: "zoo/Dog.java", line: 11, container: "zoo.Dog.run", language: "java" },
        { file: "zoo/Park.java", line: 4, container: null, language: "java" },
        { file: "zoo/Dog.java", line: 15, container: "zoo.Dog.bark", language: "java" },
      ],
      totalCount: 3,
    });

    expect(text.split("\n")).toEqual([
      "# Usages of zoo.Dog.speak",
      "",
      "Found 3 usage(s):",
      "",
      "## zoo/Dog.java (2)",
      "  L11 in zoo.Dog.run",
      "  L15 in zoo.Dog.bark",
      "",
      "## zoo/Park.java (1)",
      "  L4",
    ]);
    expect(data.totalCount).toBe(3);
  });

  it("reports none", () => {
    const { text } = formatUsages({ element: "zoo.Puppy", usages: [], totalCount: 0 });
    expect(text).toBe("# Usages of zoo.Puppy\n\nNo usages found.");
  });
});

describe("formatDefinition", () => {
  it("renders kind, language and location", () => {
    const definition = {
      name: "speak",
      qualifiedName: "zoo.Dog.speak",
      kind: "method",
      file: "zoo/Dog.java",
      line: 5,
      language: "java",
    };
    const { text, data } = formatDefinition(definition);

    expect(text.split("\n")).toEqual([
      "# Definition: zoo.Dog.speak",
      "",
      "**Kind:** method",
      "**Language:** java",
      "**Location:** zoo/Dog.java:5",
    ]);
    expect(data).toEqual({ definition });
  });

  it("falls back to the simple name for external declarations", () => {
    const { text } = formatDefinition({
      name: "Object",
      qualifiedName: null,
      kind: "class",
      file: null,
      line: null,
      language: "java",
    });
    expect(text.split("\n")[0]).toBe("# Definition: Object");
    expect(text.split("\n").at(-1)).toBe("**Location:** (external)");
  });
});

describe("formatIndexStatus", () => {
  it("lists languages when ready", () => {
    const { text, data } = formatIndexStatus({ ready: true, languages: ["java", "kotlin"] });
    expect(text).toBe("Index is ready.\n\n**Languages:** java, kotlin");
    expect(data).toEqual({ ready: true, languages: ["java", "kotlin"] });
  });

  it("says none when no language is served", () => {
    expect(formatIndexStatus({ ready: true, languages: [] }).text).toBe("Index is ready.\n\n**Languages:** none");
  });

  it("explains that queries fail while building", () => {
    expect(formatIndexStatus({ ready: false, languages: ["python"] }).text).toBe(
      "Index is still being built. Queries will fail until it completes."
    );
  });
});
