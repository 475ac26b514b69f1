/**
 * Declaration graph - in-memory registry of known declarations
 *
 * Relationships are stored as raw references and only resolved on query,
 * so symbols can be added in any order.
 */

import {
  ClassSymbol,
  LOCAL_MODULE,
  SymbolRef,
  TypeSymbol,
  createOpaque,
  symbolKey,
} from "../types/symbol.js";
import {
  EngineError,
  duplicateSymbol,
  invalidSymbol,
  unresolvedReference,
} from "../types/errors.js";
import { Result, ok, error, partition } from "../types/result.js";

export type DeclarationGraphOptions = {
  /** Module name of inspectable source (default: "local") */
  readonly localModule?: string;
};

/**
 * Code-unit order, so output does not depend on the host locale
 */
export const compareModules = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

export class DeclarationGraph {
  readonly localModule: string;
  private readonly symbols = new Map<string, TypeSymbol>();
  private readonly byName = new Map<string, TypeSymbol[]>();
  private currentRevision = 0;

  constructor(options: DeclarationGraphOptions = {}) {
    this.localModule = options.localModule ?? LOCAL_MODULE;
  }

  /**
   * Bumped by every mutation. Caches compare against it.
   */
  get revision(): number {
    return this.currentRevision;
  }

  get size(): number {
    return this.symbols.size;
  }

  addSymbol(symbol: TypeSymbol): Result<TypeSymbol, EngineError> {
    const key = symbolKey(symbol);
    if (this.symbols.has(key)) {
      return error(duplicateSymbol(symbol));
    }

    if (
      symbol.kind === "alias" &&
      symbol.aliasTarget.kind === "composition" &&
      symbol.aliasTarget.members.length === 0
    ) {
      return error(invalidSymbol(symbol, "composition has no members"));
    }

    this.symbols.set(key, symbol);
    const sameName = this.byName.get(symbol.name) ?? [];
    this.byName.set(
      symbol.name,
      [...sameName, symbol].sort((a, b) => compareModules(a.module, b.module))
    );
    this.currentRevision++;
    return ok(symbol);
  }

  /**
   * Look up a declaration. Unknown references yield undefined.
   */
  getSymbol(module: string, name: string): TypeSymbol | undefined {
    return this.symbols.get(symbolKey({ module, name }));
  }

  /**
   * Every declaration named `name`, ordered by module
   */
  findByName(name: string): readonly TypeSymbol[] {
    return this.byName.get(name) ?? [];
  }

  isLocal(ref: SymbolRef): boolean {
    return ref.module === this.localModule;
  }

  /**
   * Resolve a reference held by `from`.
   *
   * A missing declaration in a foreign module is an opaque leaf; a missing
   * local declaration is an ingestion error.
   */
  resolveReference(
    ref: SymbolRef,
    from: TypeSymbol
  ): Result<TypeSymbol, EngineError> {
    const symbol = this.getSymbol(ref.module, ref.name);
    if (symbol) {
      return ok(symbol);
    }
    if (this.isLocal(ref)) {
      return error(unresolvedReference(from, ref));
    }
    return ok(createOpaque(ref.name, ref.module));
  }

  allSymbols(): readonly TypeSymbol[] {
    return [...this.symbols.values()];
  }

  /**
   * Class declarations, lazily. Each iteration starts over.
   */
  allClassSymbols(): Iterable<ClassSymbol> {
    const symbols = this.symbols;
    return {
      *[Symbol.iterator]() {
        for (const symbol of symbols.values()) {
          if (symbol.kind === "class") {
            yield symbol;
          }
        }
      },
    };
  }
}

/**
 * Build a graph from a list of declarations, reporting every rejected one.
 */
export const createDeclarationGraph = (
  symbols: Iterable<TypeSymbol>,
  options: DeclarationGraphOptions = {}
): Result<DeclarationGraph, readonly EngineError[]> => {
  const graph = new DeclarationGraph(options);
  const { errors } = partition(
    Array.from(symbols, (symbol) => graph.addSymbol(symbol))
  );

  return errors.length > 0 ? error(errors) : ok(graph);
};
