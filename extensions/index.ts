import type { ExtensionDefinition } from "../opcodes/types";
import { DEPTH } from "./depth";
import { EQ } from "./eq";
import { GT } from "./gt";
import { GTE } from "./gte";
import { LT } from "./lt";
import { LTE } from "./lte";
import { MOD } from "./mod";
import { NEG } from "./neg";
import { NEQ } from "./neq";
import { OVER } from "./over";
import { PEEK } from "./peek";
import { ROT } from "./rot";

// Bundled extension set, in name order so registration is reproducible.
export const BUILTIN_EXTENSIONS: readonly ExtensionDefinition[] = [
  DEPTH,
  EQ,
  GT,
  GTE,
  LT,
  LTE,
  MOD,
  NEG,
  NEQ,
  OVER,
  PEEK,
  ROT,
];

export { DEPTH, EQ, GT, GTE, LT, LTE, MOD, NEG, NEQ, OVER, PEEK, ROT };
