export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

/** Bad command line. The CLI prints it with the help hint and exits 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const BOOLEAN_FLAGS = new Set(["help", "version", "offline", "verbose", "quiet", "no-color"]);

const KNOWN_FLAGS = new Set([...BOOLEAN_FLAGS, "format", "output", "fail-on", "mode"]);

export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] ?? "";
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[sweepr] Warning: unknown flag --${key}\n`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else if (eq !== -1) {
        args[key] = arg.slice(eq + 1);
      } else {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith("--")) {
          throw new UsageError(`--${key} requires a value`);
        }
        args[key] = value;
        i++;
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else if (key === "q") args["quiet"] = "true";
      else if (key === "o") {
        const value = argv[i + 1];
        if (value === undefined) throw new UsageError("-o requires a value");
        args["output"] = value;
        i++;
      } else {
        process.stderr.write(`[sweepr] Warning: unknown flag -${key}\n`);
      }
    } else {
      positional.push(arg);
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.SWEEPR_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.SWEEPR_LOG_LEVEL = "error";
  }

  return { command, args, positional };
}
