/**
 * Version command - display version information.
 */

import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { CliCommand, ParsedArgs } from "./base.js";
import { EXIT_CODES } from "../exit-codes.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export class VersionCommand implements CliCommand {
  name = "version";
  description = "Show version information";

  async execute(args: ParsedArgs): Promise<number> {
    let version: unknown;
    try {
      const pkgPath = resolve(__dirname, "../../package.json");
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
      version = typeof pkg === "object" && pkg !== null && "version" in pkg ? pkg.version : undefined;
    } catch (err) {
      console.error(`Failed to read version information: ${String(err)}`);
      return EXIT_CODES.applicationError;
    }

    if (typeof version !== "string") {
      console.error("Failed to read version information: no version field");
      return EXIT_CODES.applicationError;
    }

    console.log(`dgraph-admin v${version}`);
    if (args.flags.verbose) {
      console.log(`Node.js ${process.version}`);
      console.log(`Platform: ${process.platform} ${process.arch}`);
    }
    return EXIT_CODES.success;
  }
}
