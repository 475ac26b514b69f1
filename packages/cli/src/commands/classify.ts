/**
 * lineage classify command - Apply the configured rules to every class
 */

import {
  ClassificationEngine,
  type ClassificationReport,
  type Diagnostic,
  classify,
  formatRef,
  isDiagnosticError,
} from "@lineage/engine";
import type { CommandOutcome, ResolvedConfig, Result } from "../types.js";
import { loadInputs } from "./inputs.js";
import {
  describeSite,
  diagnosticToJson,
  resolutionToJson,
  toJsonLines,
} from "./format.js";

/**
 * Render a report as indented text: each class, its findings and their
 * evidence, then the dynamic references that did not resolve
 */
export const formatReport = (
  report: ClassificationReport,
  classCount: number,
  quiet = false
): readonly string[] => {
  const lines: string[] = [];

  for (const { symbol, findings } of report.classifications) {
    lines.push(formatRef(symbol));
    for (const finding of findings) {
      lines.push(`  ${finding.category} (${finding.ruleId}): ${finding.verdict}`);
      lines.push(...finding.evidence.map((line) => `    ${line}`));
    }
  }

  if (report.unresolvedSites.length > 0) {
    lines.push("Unresolved dynamic references:");
    lines.push(...report.unresolvedSites.map((site) => `  ${describeSite(site)}`));
  }

  if (!quiet) {
    lines.push(
      `${report.classifications.length} of ${classCount} classes classified`
    );
  }

  return lines;
};

export const reportToJson = (
  report: ClassificationReport,
  diagnostics: readonly Diagnostic[]
) => ({
  classifications: report.classifications.map(({ symbol, findings }) => ({
    symbol: formatRef(symbol),
    findings,
  })),
  unresolvedSites: report.unresolvedSites.map(({ binding, resolution }) => ({
    ...binding,
    resolution: resolutionToJson(resolution),
  })),
  diagnostics: diagnostics.map(diagnosticToJson),
});

export const classifyCommand = (
  config: ResolvedConfig
): Result<CommandOutcome, readonly Diagnostic[]> => {
  const inputs = loadInputs(config);
  if (!inputs.ok) {
    return inputs;
  }

  const { graph, bindings } = inputs.value;
  const engine = new ClassificationEngine(graph, {
    moduleScope: config.moduleScope,
  });
  const classCount = [...graph.allClassSymbols()].length;

  if (config.verbose) {
    console.log(
      `[classify] ${config.rules.length} rules, ${classCount} classes, ${bindings.length} bindings`
    );
  }

  const report = classify(engine, config.rules, bindings);
  const diagnostics = [...inputs.value.diagnostics, ...report.diagnostics];

  return {
    ok: true,
    value: {
      exitCode: diagnostics.some(isDiagnosticError) ? 2 : 0,
      output: config.json
        ? toJsonLines(reportToJson(report, diagnostics))
        : formatReport(report, classCount, config.quiet),
      diagnostics: config.json ? [] : diagnostics,
    },
  };
};
