/**
 * Declaration symbol model
 */

import type { SourceLocation } from "./diagnostic.js";

/**
 * Module name used for declarations from inspectable source
 */
export const LOCAL_MODULE = "local";

export type SymbolKind = "class" | "protocol" | "alias" | "opaque";

/**
 * Unresolved pointer to a declaration. Lets ingestion record forward references.
 */
export type SymbolRef = {
  readonly module: string;
  readonly name: string;
};

export type AliasTarget =
  | { readonly kind: "single"; readonly target: SymbolRef }
  | { readonly kind: "composition"; readonly members: readonly SymbolRef[] };

type SymbolBase = {
  readonly name: string;
  readonly module: string;
  readonly location?: SourceLocation;
};

export type ClassSymbol = SymbolBase & {
  readonly kind: "class";
  readonly declaredSuperclass?: SymbolRef;
  readonly declaredProtocols: readonly SymbolRef[];
};

export type ProtocolSymbol = SymbolBase & {
  readonly kind: "protocol";
  readonly declaredProtocols: readonly SymbolRef[];
};

export type AliasSymbol = SymbolBase & {
  readonly kind: "alias";
  readonly aliasTarget: AliasTarget;
};

/**
 * Declaration defined outside inspectable source. Nothing is known about it
 * beyond its name and module.
 */
export type OpaqueSymbol = SymbolBase & {
  readonly kind: "opaque";
};

export type TypeSymbol =
  | ClassSymbol
  | ProtocolSymbol
  | AliasSymbol
  | OpaqueSymbol;

/**
 * Any symbol an alias can finally stand for
 */
export type ConcreteSymbol = Exclude<TypeSymbol, AliasSymbol>;

/**
 * Entries of a superclass chain
 */
export type AncestorSymbol = ClassSymbol | OpaqueSymbol;

/**
 * Entries of an effective protocol set
 */
export type CapabilitySymbol = ProtocolSymbol | OpaqueSymbol;

/**
 * Statically observed assignment of a value to a configuration key
 */
export type DynamicBinding = {
  readonly key: string;
  readonly literalValue?: string; // absent when not provably a literal
  readonly siteId: string;
};

export const symbolKey = (ref: SymbolRef): string =>
  `${ref.module}::${ref.name}`;

export const refOf = (symbol: SymbolRef): SymbolRef => ({
  module: symbol.module,
  name: symbol.name,
});

export const sameSymbol = (a: SymbolRef, b: SymbolRef): boolean =>
  a.module === b.module && a.name === b.name;

export const formatRef = (ref: SymbolRef): string => `${ref.module}.${ref.name}`;

export const createClass = (
  name: string,
  options: {
    readonly module?: string;
    readonly superclass?: SymbolRef;
    readonly protocols?: readonly SymbolRef[];
    readonly location?: SourceLocation;
  } = {}
): ClassSymbol => ({
  kind: "class",
  name,
  module: options.module ?? LOCAL_MODULE,
  declaredSuperclass: options.superclass,
  declaredProtocols: options.protocols ?? [],
  location: options.location,
});

export const createProtocol = (
  name: string,
  options: {
    readonly module?: string;
    readonly protocols?: readonly SymbolRef[];
    readonly location?: SourceLocation;
  } = {}
): ProtocolSymbol => ({
  kind: "protocol",
  name,
  module: options.module ?? LOCAL_MODULE,
  declaredProtocols: options.protocols ?? [],
  location: options.location,
});

export const createAlias = (
  name: string,
  target: SymbolRef | readonly SymbolRef[],
  options: { readonly module?: string; readonly location?: SourceLocation } = {}
): AliasSymbol => ({
  kind: "alias",
  name,
  module: options.module ?? LOCAL_MODULE,
  aliasTarget: isRefList(target)
    ? { kind: "composition", members: target }
    : { kind: "single", target },
  location: options.location,
});

export const createOpaque = (name: string, module: string): OpaqueSymbol => ({
  kind: "opaque",
  name,
  module,
});

const isRefList = (
  target: SymbolRef | readonly SymbolRef[]
): target is readonly SymbolRef[] => Array.isArray(target);
