/**
 * Shared text and JSON rendering for command output
 */

import {
  type Diagnostic,
  type DynamicResolution,
  type SiteReport,
  formatRef,
} from "@lineage/engine";

export type ResolutionJson =
  | { readonly kind: "resolved"; readonly symbol: string }
  | { readonly kind: "ambiguous"; readonly candidates: readonly string[] }
  | { readonly kind: "unresolvable"; readonly reason: string };

export const resolutionToJson = (
  resolution: DynamicResolution
): ResolutionJson => {
  switch (resolution.kind) {
    case "resolved":
      return { kind: "resolved", symbol: formatRef(resolution.symbol) };
    case "ambiguous":
      return {
        kind: "ambiguous",
        candidates: resolution.candidates.map(formatRef),
      };
    case "unresolvable":
      return { kind: "unresolvable", reason: resolution.reason };
  }
};

export const diagnosticToJson = (diagnostic: Diagnostic) => ({
  code: diagnostic.code,
  severity: diagnostic.severity,
  message: diagnostic.message,
  ...(diagnostic.location ? { location: diagnostic.location } : {}),
  ...(diagnostic.hint ? { hint: diagnostic.hint } : {}),
});

export const describeSite = ({ binding, resolution }: SiteReport): string => {
  const value =
    binding.literalValue === undefined ? "" : ` = "${binding.literalValue}"`;
  const site = `${binding.key}${value} at ${binding.siteId}`;
  switch (resolution.kind) {
    case "resolved":
      return `${site}: ${formatRef(resolution.symbol)}`;
    case "ambiguous":
      return `${site}: ambiguous (${resolution.candidates.map(formatRef).join(", ")})`;
    case "unresolvable":
      return resolution.reason === "not-literal"
        ? `${site}: not a static literal`
        : `${site}: no declared class`;
  }
};

export const toJsonLines = (value: unknown): readonly string[] => [
  JSON.stringify(value, null, 2),
];
