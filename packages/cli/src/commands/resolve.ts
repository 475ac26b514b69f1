/**
 * lineage resolve command - Show the superclass chain and effective
 * protocols of one class
 */

import {
  ClassificationEngine,
  type DeclarationGraph,
  type Diagnostic,
  type ResolvedType,
  type TypeSymbol,
  createDiagnostic,
  formatRef,
  toDiagnostic,
} from "@lineage/engine";
import type { CommandOutcome, ResolvedConfig, Result } from "../types.js";
import { loadInputs } from "./inputs.js";
import { toJsonLines } from "./format.js";

/**
 * Symbol named `text`: `Module.Name` when that module declares it,
 * otherwise a plain name, local declaration first
 */
export const findSymbol = (
  graph: DeclarationGraph,
  text: string
): TypeSymbol | undefined => {
  const dot = text.indexOf(".");
  if (dot > 0) {
    const qualified = graph.getSymbol(text.slice(0, dot), text.slice(dot + 1));
    if (qualified) {
      return qualified;
    }
  }
  const matches = graph.findByName(text);
  return matches.find((symbol) => graph.isLocal(symbol)) ?? matches[0];
};

export const formatResolvedType = (type: ResolvedType): readonly string[] => {
  const chain = type.canonicalSuperclassChain.map(formatRef);
  const protocols = type.effectiveProtocols.map(formatRef);
  const last = type.canonicalSuperclassChain.at(-1);

  const lines = [
    formatRef(type.symbol),
    `  superclass chain: ${chain.length > 0 ? chain.join(" → ") : "(root)"}`,
    `  protocols: ${protocols.length > 0 ? protocols.join(", ") : "(none)"}`,
  ];
  if (type.terminatedAtOpaque && last) {
    lines.push(`  ancestry unknown beyond ${formatRef(last)}`);
  }
  return lines;
};

export const resolvedTypeToJson = (type: ResolvedType) => ({
  symbol: formatRef(type.symbol),
  superclassChain: type.canonicalSuperclassChain.map(formatRef),
  protocols: type.effectiveProtocols.map(formatRef),
  terminatedAtOpaque: type.terminatedAtOpaque,
});

export const resolveCommand = (
  config: ResolvedConfig,
  typeName: string
): Result<CommandOutcome, readonly Diagnostic[]> => {
  const inputs = loadInputs(config);
  if (!inputs.ok) {
    return inputs;
  }

  const graph = inputs.value.graph;
  const symbol = findSymbol(graph, typeName);
  if (!symbol) {
    return {
      ok: false,
      error: [
        createDiagnostic("LIN1006", "error", `No declaration named ${typeName}`),
      ],
    };
  }

  if (config.verbose) {
    console.log(`[resolve] ${formatRef(symbol)} (${symbol.kind})`);
  }

  const engine = new ClassificationEngine(graph);
  const type = engine.resolveType(symbol);
  if (!type.ok) {
    return {
      ok: true,
      value: {
        exitCode: 2,
        output: [],
        diagnostics: [toDiagnostic(type.error)],
      },
    };
  }

  return {
    ok: true,
    value: {
      exitCode: 0,
      output: config.json
        ? toJsonLines(resolvedTypeToJson(type.value))
        : formatResolvedType(type.value),
      diagnostics: inputs.value.diagnostics,
    },
  };
};
