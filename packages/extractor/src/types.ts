/**
 * Extractor types
 */

import type {
  Diagnostic,
  DynamicBinding,
  TypeSymbol,
} from "@lineage/engine";

export type SourceInput = {
  readonly fileName: string;
  readonly content: string;
};

export type ExtractOptions = {
  /** Module of every declaration found in the sources (default "local") */
  readonly localModule?: string;
  /** Record only bindings of these keys */
  readonly dynamicKeys?: readonly string[];
  /** Files read from disk are named relative to this directory */
  readonly rootDir?: string;
};

export type Extraction = {
  readonly symbols: readonly TypeSymbol[];
  readonly bindings: readonly DynamicBinding[];
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * Name as written in source, before import resolution. `qualifier` is the
 * namespace part of `UIKit.UIView`.
 */
export type WrittenName = {
  readonly qualifier?: string;
  readonly name: string;
};
