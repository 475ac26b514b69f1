/**
 * Resolution error taxonomy
 *
 * Every variant is fatal to the request that produced it only; the graph and
 * the engine stay usable for other symbols.
 */

import {
  Diagnostic,
  DiagnosticCode,
  SourceLocation,
  createDiagnostic,
} from "./diagnostic.js";
import { SymbolKind, SymbolRef, formatRef, refOf } from "./symbol.js";

type Located = { readonly location?: SourceLocation };

export type DuplicateSymbolError = {
  readonly kind: "duplicateSymbol";
  readonly symbol: SymbolRef;
  readonly location?: SourceLocation;
};

export type CyclicAliasError = {
  readonly kind: "cyclicAlias";
  readonly cycle: readonly SymbolRef[];
};

export type CyclicInheritanceError = {
  readonly kind: "cyclicInheritance";
  readonly cycle: readonly SymbolRef[];
};

export type InvalidSuperclassAliasError = {
  readonly kind: "invalidSuperclassAlias";
  readonly subject: SymbolRef;
  readonly alias: SymbolRef;
  readonly location?: SourceLocation;
};

export type NotAClassError = {
  readonly kind: "notAClass";
  readonly symbol: SymbolRef;
  readonly actual: SymbolKind;
};

export type UnresolvedReferenceError = {
  readonly kind: "unresolvedReference";
  readonly from: SymbolRef;
  readonly reference: SymbolRef;
  readonly location?: SourceLocation;
};

export type KindMismatchError = {
  readonly kind: "kindMismatch";
  readonly subject: SymbolRef;
  readonly reference: SymbolRef;
  readonly expected: "class" | "protocol";
  readonly actual: SymbolKind;
  readonly location?: SourceLocation;
};

export type InvalidSymbolError = {
  readonly kind: "invalidSymbol";
  readonly symbol: SymbolRef;
  readonly reason: string;
  readonly location?: SourceLocation;
};

export type EngineError =
  | DuplicateSymbolError
  | CyclicAliasError
  | CyclicInheritanceError
  | InvalidSuperclassAliasError
  | NotAClassError
  | UnresolvedReferenceError
  | KindMismatchError
  | InvalidSymbolError;

export const duplicateSymbol = (
  symbol: SymbolRef & Located
): DuplicateSymbolError => ({
  kind: "duplicateSymbol",
  symbol: refOf(symbol),
  location: symbol.location,
});

export const cyclicAlias = (cycle: readonly SymbolRef[]): CyclicAliasError => ({
  kind: "cyclicAlias",
  cycle: cycle.map(refOf),
});

export const cyclicInheritance = (
  cycle: readonly SymbolRef[]
): CyclicInheritanceError => ({
  kind: "cyclicInheritance",
  cycle: cycle.map(refOf),
});

export const invalidSuperclassAlias = (
  subject: SymbolRef & Located,
  alias: SymbolRef
): InvalidSuperclassAliasError => ({
  kind: "invalidSuperclassAlias",
  subject: refOf(subject),
  alias: refOf(alias),
  location: subject.location,
});

export const notAClass = (
  symbol: SymbolRef & { readonly kind: SymbolKind }
): NotAClassError => ({
  kind: "notAClass",
  symbol: refOf(symbol),
  actual: symbol.kind,
});

export const unresolvedReference = (
  from: SymbolRef & Located,
  reference: SymbolRef
): UnresolvedReferenceError => ({
  kind: "unresolvedReference",
  from: refOf(from),
  reference: refOf(reference),
  location: from.location,
});

export const kindMismatch = (
  subject: SymbolRef & Located,
  reference: SymbolRef & { readonly kind: SymbolKind },
  expected: "class" | "protocol"
): KindMismatchError => ({
  kind: "kindMismatch",
  subject: refOf(subject),
  reference: refOf(reference),
  expected,
  actual: reference.kind,
  location: subject.location,
});

export const invalidSymbol = (
  symbol: SymbolRef & Located,
  reason: string
): InvalidSymbolError => ({
  kind: "invalidSymbol",
  symbol: refOf(symbol),
  reason,
  location: symbol.location,
});

const withArticle = (kind: string): string =>
  /^[aeiou]/.test(kind) ? `an ${kind}` : `a ${kind}`;

const formatCycle = (cycle: readonly SymbolRef[]): string =>
  cycle.map(formatRef).join(" → ");

const ERROR_CODES: Readonly<Record<EngineError["kind"], DiagnosticCode>> = {
  duplicateSymbol: "LIN1001",
  cyclicAlias: "LIN1002",
  cyclicInheritance: "LIN1003",
  invalidSuperclassAlias: "LIN1004",
  notAClass: "LIN1005",
  unresolvedReference: "LIN1006",
  kindMismatch: "LIN1007",
  invalidSymbol: "LIN1008",
};

export const errorCode = (err: EngineError): DiagnosticCode =>
  ERROR_CODES[err.kind];

export const describeError = (err: EngineError): string => {
  switch (err.kind) {
    case "duplicateSymbol":
      return `Symbol ${formatRef(err.symbol)} is already declared`;
    case "cyclicAlias":
      return `Cyclic alias: ${formatCycle(err.cycle)}`;
    case "cyclicInheritance":
      return `Cyclic inheritance: ${formatCycle(err.cycle)}`;
    case "invalidSuperclassAlias":
      return `${formatRef(err.subject)} inherits from ${formatRef(err.alias)}, which is a protocol composition`;
    case "notAClass":
      return `${formatRef(err.symbol)} is ${withArticle(err.actual)}, not a class`;
    case "unresolvedReference":
      return `${formatRef(err.from)} refers to undeclared ${formatRef(err.reference)}`;
    case "kindMismatch":
      return `${formatRef(err.subject)} uses ${formatRef(err.reference)} as a ${err.expected}, but it is ${withArticle(err.actual)}`;
    case "invalidSymbol":
      return `Invalid declaration ${formatRef(err.symbol)}: ${err.reason}`;
  }
};

const errorHint = (err: EngineError): string | undefined => {
  switch (err.kind) {
    case "cyclicAlias":
      return "Point one of the aliases at a concrete declaration";
    case "invalidSuperclassAlias":
      return "Compositions can only be used where protocols are expected";
    case "unresolvedReference":
      return "Declare the symbol, or tag it with its external module so it is treated as opaque";
    default:
      return undefined;
  }
};

export const toDiagnostic = (err: EngineError): Diagnostic =>
  createDiagnostic(
    errorCode(err),
    "error",
    describeError(err),
    "location" in err ? err.location : undefined,
    errorHint(err)
  );
