/**
 * Graph file loader - Reads and validates declaration graph JSON documents.
 *
 * Document shape:
 *
 * ```json
 * {
 *   "localModule": "local",
 *   "symbols": [
 *     { "kind": "opaque", "name": "UIViewController", "module": "UIKit" },
 *     { "kind": "alias", "name": "BaseController",
 *       "target": { "module": "UIKit", "name": "UIViewController" } },
 *     { "kind": "alias", "name": "AnalyticsEvent",
 *       "composition": [{ "name": "Serializable" }, { "name": "Trackable" }] },
 *     { "kind": "class", "name": "ProfileScreen",
 *       "superclass": { "module": "UIKit", "name": "UIViewController" } }
 *   ],
 *   "bindings": [
 *     { "key": "screen_name", "literalValue": "ProfileScreen", "siteId": "app.ts:42" }
 *   ]
 * }
 * ```
 *
 * A reference without `module` points into the local module.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Result } from "../types/result.js";
import {
  Diagnostic,
  DiagnosticCode,
  SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";
import {
  AliasTarget,
  DynamicBinding,
  LOCAL_MODULE,
  SymbolKind,
  SymbolRef,
  TypeSymbol,
} from "../types/symbol.js";
import { toDiagnostic } from "../types/errors.js";
import {
  DeclarationGraph,
  createDeclarationGraph,
} from "./declaration-graph.js";

export type GraphDocument = {
  readonly localModule: string;
  readonly symbols: readonly TypeSymbol[];
  readonly bindings: readonly DynamicBinding[];
};

export type LoadedGraph = {
  readonly graph: DeclarationGraph;
  readonly bindings: readonly DynamicBinding[];
};

const SYMBOL_KINDS: readonly SymbolKind[] = ["class", "protocol", "alias", "opaque"];

type Json = Record<string, unknown>;

const isObject = (value: unknown): value is Json =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fail = (code: DiagnosticCode, message: string): Diagnostic =>
  createDiagnostic(code, "error", message);

/**
 * Load and validate a graph file.
 */
export const loadGraphFile = (
  filePath: string
): Result<GraphDocument, readonly Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [fail("LIN9001", `Graph file not found: ${filePath}`)],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [fail("LIN9002", `Failed to read graph file: ${String(err)}`)],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return {
      ok: false,
      error: [fail("LIN9003", `Invalid JSON in graph file: ${String(err)}`)],
    };
  }

  return parseGraphDocument(parsed, path.basename(filePath));
};

/**
 * Load a graph file and build its declaration graph
 */
export const loadGraph = (
  filePath: string
): Result<LoadedGraph, readonly Diagnostic[]> => {
  const document = loadGraphFile(filePath);
  if (!document.ok) {
    return document;
  }
  return buildLoadedGraph(document.value);
};

export const buildLoadedGraph = (
  document: GraphDocument
): Result<LoadedGraph, readonly Diagnostic[]> => {
  const graph = createDeclarationGraph(document.symbols, {
    localModule: document.localModule,
  });
  if (!graph.ok) {
    return { ok: false, error: graph.error.map(toDiagnostic) };
  }
  return { ok: true, value: { graph: graph.value, bindings: document.bindings } };
};

/**
 * Validate parsed JSON against the graph document schema.
 *
 * @param source - Name used in messages
 */
export const parseGraphDocument = (
  data: unknown,
  source: string
): Result<GraphDocument, readonly Diagnostic[]> => {
  if (!isObject(data)) {
    return {
      ok: false,
      error: [
        fail(
          "LIN9004",
          `Graph file must be an object, got ${Array.isArray(data) ? "array" : typeof data}`
        ),
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];

  let localModule = LOCAL_MODULE;
  if (data.localModule !== undefined) {
    if (typeof data.localModule === "string" && data.localModule !== "") {
      localModule = data.localModule;
    } else {
      diagnostics.push(
        fail("LIN9015", `'localModule' must be a non-empty string in ${source}`)
      );
    }
  }

  const symbols: TypeSymbol[] = [];
  if (!Array.isArray(data.symbols)) {
    diagnostics.push(
      fail("LIN9005", `Missing or invalid 'symbols' field in ${source}`)
    );
  } else {
    data.symbols.forEach((entry: unknown, index: number) => {
      const symbol = parseSymbol(
        entry,
        `symbol ${index} in ${source}`,
        localModule
      );
      if (symbol.ok) {
        symbols.push(symbol.value);
      } else {
        diagnostics.push(...symbol.error);
      }
    });
  }

  const bindings: DynamicBinding[] = [];
  if (data.bindings !== undefined) {
    if (!Array.isArray(data.bindings)) {
      diagnostics.push(
        fail("LIN9013", `'bindings' must be an array in ${source}`)
      );
    } else {
      data.bindings.forEach((entry: unknown, index: number) => {
        const binding = parseBinding(entry, `binding ${index} in ${source}`);
        if (binding.ok) {
          bindings.push(binding.value);
        } else {
          diagnostics.push(binding.error);
        }
      });
    }
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }
  return { ok: true, value: { localModule, symbols, bindings } };
};

const parseRef = (
  value: unknown,
  localModule: string
): SymbolRef | undefined => {
  if (!isObject(value) || typeof value.name !== "string" || value.name === "") {
    return undefined;
  }
  if (value.module === undefined) {
    return { module: localModule, name: value.name };
  }
  if (typeof value.module !== "string" || value.module === "") {
    return undefined;
  }
  return { module: value.module, name: value.name };
};

const parseRefList = (
  value: unknown,
  localModule: string
): readonly SymbolRef[] | undefined => {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const refs: SymbolRef[] = [];
  for (const entry of value) {
    const ref = parseRef(entry, localModule);
    if (!ref) {
      return undefined;
    }
    refs.push(ref);
  }
  return refs;
};

const parseLocation = (value: unknown): SourceLocation | undefined => {
  if (
    !isObject(value) ||
    typeof value.file !== "string" ||
    typeof value.line !== "number" ||
    typeof value.column !== "number"
  ) {
    return undefined;
  }
  return {
    file: value.file,
    line: value.line,
    column: value.column,
    length: typeof value.length === "number" ? value.length : 0,
  };
};

const RELATIONSHIP_FIELDS = ["superclass", "protocols", "target", "composition"] as const;

const ALLOWED_FIELDS: Readonly<Record<SymbolKind, readonly string[]>> = {
  class: ["superclass", "protocols"],
  protocol: ["protocols"],
  alias: ["target", "composition"],
  opaque: [],
};

const parseSymbol = (
  data: unknown,
  context: string,
  localModule: string
): Result<TypeSymbol, readonly Diagnostic[]> => {
  if (!isObject(data)) {
    return {
      ok: false,
      error: [fail("LIN9006", `Invalid ${context}: must be an object`)],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const name = data.name;
  const module = data.module ?? localModule;

  if (typeof name !== "string" || name === "") {
    diagnostics.push(
      fail("LIN9007", `Invalid ${context}: missing or invalid 'name'`)
    );
  }
  if (typeof module !== "string" || module === "") {
    diagnostics.push(
      fail("LIN9007", `Invalid ${context}: invalid 'module'`)
    );
  }

  const kind = SYMBOL_KINDS.find((k) => k === data.kind);
  if (!kind) {
    diagnostics.push(
      fail(
        "LIN9008",
        `Invalid ${context}: 'kind' must be one of ${SYMBOL_KINDS.join(", ")}`
      )
    );
  }

  if (diagnostics.length > 0 || !kind || typeof name !== "string" || typeof module !== "string") {
    return { ok: false, error: diagnostics };
  }

  const present = RELATIONSHIP_FIELDS.filter((field) => data[field] !== undefined);
  const disallowed = present.filter((field) => !ALLOWED_FIELDS[kind].includes(field));
  if (disallowed.length > 0) {
    const code: DiagnosticCode = kind === "opaque" ? "LIN9012" : "LIN9011";
    const message =
      kind === "opaque"
        ? `Invalid ${context}: opaque symbol ${name} cannot declare ${disallowed.join(", ")}`
        : `Invalid ${context}: ${kind} cannot declare ${disallowed.join(", ")}`;
    return { ok: false, error: [fail(code, message)] };
  }

  const location = parseLocation(data.location);
  const base = { name, module, location };

  switch (kind) {
    case "opaque":
      return { ok: true, value: { kind, name, module } };

    case "class": {
      const superclass =
        data.superclass === undefined
          ? undefined
          : parseRef(data.superclass, localModule);
      const protocols =
        data.protocols === undefined ? [] : parseRefList(data.protocols, localModule);
      if ((data.superclass !== undefined && !superclass) || !protocols) {
        return {
          ok: false,
          error: [
            fail(
              "LIN9009",
              `Invalid ${context}: 'superclass' and 'protocols' must be references ({ module?, name })`
            ),
          ],
        };
      }
      return {
        ok: true,
        value: { ...base, kind, declaredSuperclass: superclass, declaredProtocols: protocols },
      };
    }

    case "protocol": {
      const protocols =
        data.protocols === undefined ? [] : parseRefList(data.protocols, localModule);
      if (!protocols) {
        return {
          ok: false,
          error: [
            fail("LIN9009", `Invalid ${context}: 'protocols' must be a list of references`),
          ],
        };
      }
      return { ok: true, value: { ...base, kind, declaredProtocols: protocols } };
    }

    case "alias": {
      const target = parseAliasTarget(data, localModule);
      if (!target) {
        return {
          ok: false,
          error: [
            fail(
              "LIN9010",
              `Invalid ${context}: alias needs exactly one of 'target' (reference) or 'composition' (non-empty list of references)`
            ),
          ],
        };
      }
      return { ok: true, value: { ...base, kind, aliasTarget: target } };
    }
  }
};

const parseAliasTarget = (
  data: Json,
  localModule: string
): AliasTarget | undefined => {
  if (data.target !== undefined && data.composition !== undefined) {
    return undefined;
  }
  if (data.target !== undefined) {
    const target = parseRef(data.target, localModule);
    return target ? { kind: "single", target } : undefined;
  }
  const members = parseRefList(data.composition, localModule);
  return members && members.length > 0
    ? { kind: "composition", members }
    : undefined;
};

const parseBinding = (
  data: unknown,
  context: string
): Result<DynamicBinding, Diagnostic> => {
  if (
    !isObject(data) ||
    typeof data.key !== "string" ||
    typeof data.siteId !== "string" ||
    (data.literalValue !== undefined && typeof data.literalValue !== "string")
  ) {
    return {
      ok: false,
      error: fail(
        "LIN9014",
        `Invalid ${context}: needs string 'key' and 'siteId', and 'literalValue' must be a string when present`
      ),
    };
  }
  return {
    ok: true,
    value:
      data.literalValue === undefined
        ? { key: data.key, siteId: data.siteId }
        : { key: data.key, literalValue: data.literalValue, siteId: data.siteId },
  };
};
