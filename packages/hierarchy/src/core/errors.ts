import type { LanguageTag } from "./model.js";

/**
 * Recoverable query failures. Each is reported to the client as data,
 * distinct from an empty result.
 */
export type QueryError =
  | { code: "NO_ELEMENT_AT_POSITION"; message: string }
  | {
      code: "NO_PROVIDER_FOR_LANGUAGE";
      message: string;
      language: LanguageTag;
      supportedLanguages: LanguageTag[];
    }
  | { code: "NOT_A_TYPE_OR_METHOD"; message: string }
  | { code: "INDEX_NOT_READY"; message: string }
  | { code: "CANCELLED"; message: string }
  | { code: "INVALID_ARGUMENT"; message: string };

export type QueryErrorCode = QueryError["code"];

export const INDEX_NOT_READY_MESSAGE = "Index is not ready. Please wait for indexing to complete.";

/**
 * Thrown by a code model that is asked a question while still building.
 */
export class IndexNotReadyError extends Error {
  constructor(message = INDEX_NOT_READY_MESSAGE) {
    super(message);
    this.name = "IndexNotReadyError";
  }
}

export const QueryErrors = {
  noElementAtPosition(file: string, line: number, column: number): QueryError {
    return {
      code: "NO_ELEMENT_AT_POSITION",
      message: `No element found at position ${file}:${line}:${column}`,
    };
  },

  noElementNamed(name: string): QueryError {
    return { code: "NO_ELEMENT_AT_POSITION", message: `No element found with name '${name}'` };
  },

  noProvider(capabilityLabel: string, language: LanguageTag, supportedLanguages: LanguageTag[]): QueryError {
    return {
      code: "NO_PROVIDER_FOR_LANGUAGE",
      message: `No ${capabilityLabel} provider available for language: ${language}. Supported languages: ${supportedLanguages.join(", ") || "none"}`,
      language,
      supportedLanguages,
    };
  },

  notATypeOrMethod(expected: "type" | "method" | "type or method"): QueryError {
    return {
      code: "NOT_A_TYPE_OR_METHOD",
      message: `Element at the given location is not a ${expected}`,
    };
  },

  indexNotReady(message = INDEX_NOT_READY_MESSAGE): QueryError {
    return { code: "INDEX_NOT_READY", message };
  },

  cancelled(message: string): QueryError {
    return { code: "CANCELLED", message };
  },

  invalidArgument(message: string): QueryError {
    return { code: "INVALID_ARGUMENT", message };
  },
} as const;
