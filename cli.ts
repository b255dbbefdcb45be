import { basename, dirname, extname, join } from "node:path";
import { formatBanner, shouldShowBanner } from "./banner";
import { loadExtensionDirectory } from "./opcodes/loader";
import { createRegistry, OpcodeRegistry } from "./opcodes/registry";
import type { AnnotationMode } from "./Disassembler";
import { SMConsole } from "./SMConsole";
import { compileFile, disassembleFile, runFile } from "./toolchain";

export type Command = "compile" | "run" | "disasm";

export interface CliOptions {
  command: Command;
  file: string;
  output?: string;
  trace: boolean;
  step: boolean;
  stats: boolean;
  mode: AnnotationMode;
  noBanner: boolean;
  extensionsDir?: string;
}

export const USAGE = [
  "Usage: stackmac <command> <file> [options]",
  "",
  "Commands:",
  "  compile <source>     Assemble source into STKM bytecode (-o <out>, default <source>.stkm)",
  "  run <bytecode>       Execute bytecode (--trace, --step, --stats)",
  "  disasm <bytecode>    Disassemble bytecode (-o <out>, -a/--addresses, -v/--verbose)",
  "",
  "Options:",
  "  --extensions <dir>   Load extension opcodes from <dir> (or STACKMAC_EXTENSIONS)",
  "  --no-banner          Suppress the startup banner (or STACKMAC_NO_BANNER=1)",
].join("\n");

const COMMANDS: readonly Command[] = ["compile", "run", "disasm"];

const TOOL_NAMES: Record<Command, string> = {
  compile: "Compiler",
  run: "Runtime",
  disasm: "Disassembler",
};

const ERROR_LABELS: Record<Command, string> = {
  compile: "Compilation",
  run: "Runtime",
  disasm: "Disassembly",
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
): CliOptions {
  const [command, ...rest] = args;
  if (!command || !isCommand(command)) {
    throw new UsageError(
      command ? `Unknown command: ${command}` : "A command is required",
    );
  }

  // Options that take a value
  const valueOf = (...names: string[]): string | undefined => {
    for (const name of names) {
      const idx = rest.indexOf(name);
      if (idx !== -1) {
        const value = rest[idx + 1];
        if (value === undefined || value.startsWith("-")) {
          throw new UsageError(`Option ${name} requires a value`);
        }
        return value;
      }
    }
    return undefined;
  };
  const output = valueOf("-o", "--output");
  const extensionsFlag = valueOf("--extensions");
  const extensionsDir = extensionsFlag ?? (env.STACKMAC_EXTENSIONS || undefined);

  const flags = new Set(rest.filter((arg) => arg.startsWith("-")));
  const takenValues = new Set([output, extensionsFlag]);
  const positional = rest.filter(
    (arg) => !arg.startsWith("-") && !takenValues.has(arg),
  );
  if (positional.length === 0) {
    throw new UsageError(`${command} requires a file argument`);
  }
  if (positional.length > 1) {
    throw new UsageError(`Unexpected argument: ${positional[1]}`);
  }

  const known = new Set([
    "-o", "--output", "--extensions", "--no-banner", "--trace", "--step",
    "--stats", "-a", "--addresses", "-v", "--verbose",
  ]);
  for (const flag of flags) {
    if (!known.has(flag)) throw new UsageError(`Unknown option: ${flag}`);
  }

  const mode: AnnotationMode = flags.has("-v") || flags.has("--verbose")
    ? "verbose"
    : flags.has("-a") || flags.has("--addresses")
      ? "addresses"
      : "plain";

  return {
    command,
    file: positional[0],
    output,
    trace: flags.has("--trace"),
    step: flags.has("--step"),
    stats: flags.has("--stats"),
    mode,
    noBanner: flags.has("--no-banner"),
    extensionsDir,
  };
}

export function defaultOutputPath(source: string): string {
  const ext = extname(source);
  return join(dirname(source), `${basename(source, ext)}.stkm`);
}

export function buildRegistry(opts: CliOptions): OpcodeRegistry {
  const fromDir = opts.extensionsDir
    ? loadExtensionDirectory(opts.extensionsDir)
    : { entries: [], rejected: [] };
  const { registry } = createRegistry({
    extensions: fromDir.entries,
    verbose: opts.extensionsDir !== undefined,
  });
  return registry;
}

async function runCommand(opts: CliOptions, registry: OpcodeRegistry): Promise<void> {
  switch (opts.command) {
    case "compile": {
      const output = opts.output ?? defaultOutputPath(opts.file);
      const { program } = await compileFile(opts.file, output, registry);
      console.log(
        `Compiled ${program.length} instructions from '${opts.file}' to '${output}'`,
      );
      return;
    }
    case "run": {
      const device = new SMConsole();
      let interrupt: (() => void) | null = null;
      const onSigint = () => interrupt?.();
      process.on("SIGINT", onSigint);
      try {
        const result = await runFile(
          opts.file,
          registry,
          device,
          { trace: opts.trace, step: opts.step },
          (machine, program) => {
            interrupt = () => machine.interrupt();
            console.log(`Loaded ${program.length} instructions from '${opts.file}'`);
            console.log("=".repeat(60));
          },
        );
        if (result.status === "halted") {
          console.log("Program halted.");
        } else if (result.status === "cancelled") {
          console.log("Execution interrupted by user");
        }
        console.log("=".repeat(60));
        if (opts.stats) {
          console.log(`Instructions executed: ${result.instructions}`);
          console.log(`Total cycles (cost):   ${result.cycles}`);
        }
      } finally {
        process.off("SIGINT", onSigint);
        device.close();
      }
      return;
    }
    case "disasm": {
      const { text, instructions } = await disassembleFile(opts.file, registry, {
        mode: opts.mode,
        output: opts.output,
      });
      if (opts.output) {
        console.log(
          `Disassembled '${opts.file}' to '${opts.output}' (${instructions} instructions)`,
        );
      } else {
        process.stdout.write(text);
      }
      return;
    }
  }
}

/**
 * Parses arguments, runs one command and resolves to the process exit
 * status. Nothing here calls process.exit.
 */
export async function main(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    return 0;
  }

  let opts: CliOptions;
  try {
    opts = parseArgs(args, env);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      return 1;
    }
    throw err;
  }

  if (shouldShowBanner(opts.noBanner, env)) {
    console.log(formatBanner(TOOL_NAMES[opts.command]));
  }

  try {
    await runCommand(opts, buildRegistry(opts));
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${ERROR_LABELS[opts.command]} error: ${message}`);
    return 1;
  }
}
