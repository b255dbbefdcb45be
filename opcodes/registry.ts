import {
  CodeConflictError,
  InvalidExtensionError,
  NameConflictError,
  UnknownOpcodeError,
  UnknownOpcodeNumberError,
} from "../errors";
import { BUILTIN_EXTENSIONS } from "../extensions";
import { closeMatches } from "./suggest";
import { BASE_OPCODES } from "./tables";
import {
  ExtensionDefinition,
  OpcodeDescriptor,
  isOpcodeNumber,
  isValidMnemonic,
} from "./types";

/**
 * Merged table of base and extension opcodes. Built once at startup and
 * read-only afterwards, so one instance can be shared by every assembler,
 * codec and machine in the process.
 */
class OpcodeRegistry {
  private byName = new Map<string, OpcodeDescriptor>();
  private byCode = new Map<number, OpcodeDescriptor>();

  constructor(baseOpcodes: readonly OpcodeDescriptor[] = BASE_OPCODES) {
    for (const desc of baseOpcodes) {
      this.byName.set(desc.name, desc);
      this.byCode.set(desc.code, desc);
    }
  }

  /**
   * Adds an extension opcode. The first registration for a name or code
   * stands; later attempts are rejected, never overwrite.
   */
  registerExtension(def: ExtensionDefinition): OpcodeDescriptor {
    const cost = def.cost ?? 1;
    if (typeof def.name !== "string" || !isValidMnemonic(def.name)) {
      throw new InvalidExtensionError(
        `Extension name ${JSON.stringify(def.name)} is not an uppercase mnemonic`,
      );
    }
    if (!isOpcodeNumber(def.code)) {
      throw new InvalidExtensionError(
        `Extension ${def.name} has opcode value ${def.code} outside 0x00-0xff`,
      );
    }
    if (!Number.isInteger(cost) || cost < 1) {
      throw new InvalidExtensionError(
        `Extension ${def.name} has invalid cost ${cost}`,
      );
    }
    if (typeof def.execute !== "function") {
      throw new InvalidExtensionError(
        `Extension ${def.name} is missing its execute function`,
      );
    }

    if (this.byName.has(def.name)) {
      throw new NameConflictError(def.name);
    }
    const owner = this.byCode.get(def.code);
    if (owner) {
      throw new CodeConflictError(def.code, owner.name);
    }

    const desc: OpcodeDescriptor = {
      name: def.name,
      code: def.code,
      operandBearing: def.operandBearing === true,
      cost,
      extension: true,
      handler: def.execute,
    };
    this.byName.set(desc.name, desc);
    this.byCode.set(desc.code, desc);
    return desc;
  }

  lookupByName(name: string): OpcodeDescriptor {
    const desc = this.byName.get(name);
    if (!desc) {
      throw new UnknownOpcodeError(name, this.suggest(name));
    }
    return desc;
  }

  lookupByCode(code: number): OpcodeDescriptor {
    const desc = this.byCode.get(code);
    if (!desc) {
      throw new UnknownOpcodeNumberError(code);
    }
    return desc;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  isExtension(name: string): boolean {
    return this.byName.get(name)?.extension === true;
  }

  operandBearing(name: string): boolean {
    return this.byName.get(name)?.operandBearing === true;
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  descriptors(): OpcodeDescriptor[] {
    return [...this.byName.values()];
  }

  suggest(name: string): string[] {
    return closeMatches(name, this.byName.keys());
  }
}

export interface RejectedExtension {
  name: string;
  source?: string;
  reason: string;
}

export interface RegistrationReport {
  loaded: OpcodeDescriptor[];
  rejected: RejectedExtension[];
}

export interface ExtensionSource {
  definition: ExtensionDefinition;
  source?: string; // file the declaration came from, for reporting
}

export interface RegistryOptions {
  bundled?: boolean; // include BUILTIN_EXTENSIONS (default true)
  extensions?: readonly (ExtensionDefinition | ExtensionSource)[];
  verbose?: boolean; // log each accepted entry of `extensions`
}

function toSource(entry: ExtensionDefinition | ExtensionSource): ExtensionSource {
  return "definition" in entry ? entry : { definition: entry };
}

/**
 * Feeds extension declarations to the registry in order and collects the
 * outcome. Rejections are warned about and reported, never thrown.
 */
export function registerExtensions(
  registry: OpcodeRegistry,
  entries: readonly (ExtensionDefinition | ExtensionSource)[],
  verbose = false,
): RegistrationReport {
  const report: RegistrationReport = { loaded: [], rejected: [] };
  for (const entry of entries) {
    const { definition, source } = toSource(entry);
    try {
      const desc = registry.registerExtension(definition);
      report.loaded.push(desc);
      if (verbose) {
        console.log(
          `Loaded extension: ${desc.name} (0x${desc.code.toString(16).padStart(2, "0")})`,
        );
      }
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      const where = source ?? String(definition.name);
      console.warn(`Warning: extension ${where} rejected: ${err.message}`);
      report.rejected.push({
        name: String(definition.name),
        source,
        reason: err.message,
      });
    }
  }
  return report;
}

export function createRegistry(options: RegistryOptions = {}): {
  registry: OpcodeRegistry;
  report: RegistrationReport;
} {
  const registry = new OpcodeRegistry();
  const bundled = registerExtensions(
    registry,
    options.bundled === false ? [] : BUILTIN_EXTENSIONS,
  );
  const extra = registerExtensions(
    registry,
    options.extensions ?? [],
    options.verbose,
  );
  return {
    registry,
    report: {
      loaded: [...bundled.loaded, ...extra.loaded],
      rejected: [...bundled.rejected, ...extra.rejected],
    },
  };
}

export { OpcodeRegistry };
