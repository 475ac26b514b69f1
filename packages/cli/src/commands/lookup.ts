/**
 * lineage lookup command - Resolve a class name the way a runtime string
 * reference would be
 */

import {
  ClassificationEngine,
  type Diagnostic,
  type DynamicResolution,
  formatRef,
} from "@lineage/engine";
import type { CommandOutcome, ResolvedConfig, Result } from "../types.js";
import { loadInputs } from "./inputs.js";
import { resolutionToJson, toJsonLines } from "./format.js";

export const describeLookup = (
  literal: string,
  resolution: DynamicResolution
): string => {
  switch (resolution.kind) {
    case "resolved":
      return `${literal} → ${formatRef(resolution.symbol)}`;
    case "ambiguous":
      return `${literal} is ambiguous: ${resolution.candidates.map(formatRef).join(", ")}`;
    case "unresolvable":
      return `${literal}: no declared class has this name`;
  }
};

export const lookupCommand = (
  config: ResolvedConfig,
  literal: string
): Result<CommandOutcome, readonly Diagnostic[]> => {
  const inputs = loadInputs(config);
  if (!inputs.ok) {
    return inputs;
  }

  const engine = new ClassificationEngine(inputs.value.graph, {
    moduleScope: config.moduleScope,
  });
  const resolution = engine.resolveDynamicName({
    key: "lookup",
    literalValue: literal,
    siteId: "command line",
  });

  return {
    ok: true,
    value: {
      exitCode: resolution.kind === "resolved" ? 0 : 2,
      output: config.json
        ? toJsonLines({ literal, resolution: resolutionToJson(resolution) })
        : [describeLookup(literal, resolution)],
      diagnostics: inputs.value.diagnostics,
    },
  };
};
