/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse classify command", () => {
        const result = parseArgs(["classify"]);
        expect(result.command).to.equal("classify");
        expect(result.positionals).to.deep.equal([]);
      });

      it("should collect positionals after the command", () => {
        const result = parseArgs(["resolve", "MyCustomView", "src", "app.graph.json"]);
        expect(result.command).to.equal("resolve");
        expect(result.positionals).to.deep.equal([
          "MyCustomView",
          "src",
          "app.graph.json",
        ]);
      });

      it("should parse help command from --help", () => {
        const result = parseArgs(["--help"]);
        expect(result.command).to.equal("help");
      });

      it("should parse help command from -h after a command", () => {
        const result = parseArgs(["classify", "-h"]);
        expect(result.command).to.equal("help");
      });

      it("should parse version command from -v", () => {
        const result = parseArgs(["-v"]);
        expect(result.command).to.equal("version");
      });

      it("should leave the command empty without arguments", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
      });
    });

    describe("Options", () => {
      it("should parse flags", () => {
        const result = parseArgs(["classify", "-V", "-q", "--json"]);
        expect(result.options).to.deep.equal({
          verbose: true,
          quiet: true,
          json: true,
        });
      });

      it("should parse --verbose and --quiet long forms", () => {
        const result = parseArgs(["lookup", "--verbose", "--quiet"]);
        expect(result.options.verbose).to.equal(true);
        expect(result.options.quiet).to.equal(true);
      });

      it("should parse --config with a value", () => {
        const result = parseArgs(["classify", "-c", "config/lineage.json", "src"]);
        expect(result.options.config).to.equal("config/lineage.json");
        expect(result.positionals).to.deep.equal(["src"]);
      });

      it("should parse --local-module with a value", () => {
        const result = parseArgs(["classify", "--local-module", "App"]);
        expect(result.options.localModule).to.equal("App");
        expect(result.error).to.equal(undefined);
      });

      it("should report an option missing its value", () => {
        const result = parseArgs(["classify", "--config"]);
        expect(result.error).to.equal("--config requires a value");
      });

      it("should not take another flag as a value", () => {
        const result = parseArgs(["classify", "--local-module", "--json"]);
        expect(result.error).to.equal("--local-module requires a value");
      });

      it("should report unknown options", () => {
        const result = parseArgs(["classify", "--watch"]);
        expect(result.error).to.equal("Unknown option '--watch'");
      });
    });
  });
});
