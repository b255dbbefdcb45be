// Error taxonomy shared by the registry, assembler, codec and interpreter.

export type StackMachineErrorCode =
  | "STACK_UNDERFLOW"
  | "DIVISION_BY_ZERO"
  | "UNKNOWN_OPCODE"
  | "UNKNOWN_OPCODE_NUMBER"
  | "DUPLICATE_LABEL"
  | "EMPTY_LABEL_NAME"
  | "UNDEFINED_LABEL"
  | "INVALID_OPERAND"
  | "SOURCE_NOT_FOUND"
  | "BAD_MAGIC"
  | "UNSUPPORTED_VERSION"
  | "TRUNCATED_BYTECODE"
  | "NAME_CONFLICT"
  | "CODE_CONFLICT"
  | "INVALID_EXTENSION";

export class StackMachineError extends Error {
  constructor(
    message: string,
    public readonly code: StackMachineErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "StackMachineError";
  }
}

/**
 * Base for errors raised while reading source text. The message is
 * prefixed with the 1-based line number when one is known.
 */
export class SourceError extends StackMachineError {
  constructor(
    message: string,
    code: StackMachineErrorCode,
    public readonly line?: number,
    public readonly source?: string,
  ) {
    super(line !== undefined ? `Line ${line}: ${message}` : message, code, {
      line,
      source,
    });
    this.name = "SourceError";
  }
}

export class StackUnderflowError extends StackMachineError {
  constructor(message = "Stack underflow: cannot pop from empty stack") {
    super(message, "STACK_UNDERFLOW");
    this.name = "StackUnderflowError";
  }
}

export class DivisionByZeroError extends StackMachineError {
  constructor(message = "Division by zero") {
    super(message, "DIVISION_BY_ZERO");
    this.name = "DivisionByZeroError";
  }
}

export function formatSuggestions(suggestions: readonly string[]): string {
  return suggestions.length > 0
    ? ` (did you mean ${suggestions.join(", ")}?)`
    : "";
}

export class UnknownOpcodeError extends SourceError {
  constructor(
    public readonly opcode: string,
    public readonly suggestions: string[] = [],
    line?: number,
    source?: string,
  ) {
    super(
      `Unknown opcode '${opcode}'${formatSuggestions(suggestions)}`,
      "UNKNOWN_OPCODE",
      line,
      source,
    );
    this.name = "UnknownOpcodeError";
  }
}

export class UnknownOpcodeNumberError extends StackMachineError {
  constructor(public readonly opcodeNumber: number) {
    super(
      `Unknown opcode number: 0x${opcodeNumber.toString(16).padStart(2, "0")}`,
      "UNKNOWN_OPCODE_NUMBER",
      { opcodeNumber },
    );
    this.name = "UnknownOpcodeNumberError";
  }
}

export class DuplicateLabelError extends SourceError {
  constructor(public readonly label: string, line?: number, source?: string) {
    super(`Duplicate label '${label}'`, "DUPLICATE_LABEL", line, source);
    this.name = "DuplicateLabelError";
  }
}

export class EmptyLabelNameError extends SourceError {
  constructor(line?: number, source?: string) {
    super("Empty label name", "EMPTY_LABEL_NAME", line, source);
    this.name = "EmptyLabelNameError";
  }
}

export class UndefinedLabelError extends SourceError {
  constructor(public readonly label: string, line?: number, source?: string) {
    super(`Undefined label '${label}'`, "UNDEFINED_LABEL", line, source);
    this.name = "UndefinedLabelError";
  }
}

export class InvalidOperandError extends SourceError {
  constructor(message: string, line?: number, source?: string) {
    super(message, "INVALID_OPERAND", line, source);
    this.name = "InvalidOperandError";
  }
}

export class SourceNotFoundError extends StackMachineError {
  constructor(
    public readonly path: string,
    public readonly errno: string = "ENOENT", // code of the failed read
  ) {
    super(
      errno === "ENOENT"
        ? `Source file '${path}' not found`
        : `Source file '${path}' could not be read (${errno})`,
      "SOURCE_NOT_FOUND",
      { path, errno },
    );
    this.name = "SourceNotFoundError";
  }
}

export class BadMagicError extends StackMachineError {
  constructor(found: Buffer) {
    super(
      `Invalid file format: expected STKM magic number, got ${JSON.stringify(found.toString("latin1"))}`,
      "BAD_MAGIC",
      { found: found.toString("hex") },
    );
    this.name = "BadMagicError";
  }
}

export class UnsupportedVersionError extends StackMachineError {
  constructor(
    public readonly version: number,
    public readonly expected: number,
  ) {
    super(
      `Unsupported version: ${version} (expected ${expected})`,
      "UNSUPPORTED_VERSION",
      { version, expected },
    );
    this.name = "UnsupportedVersionError";
  }
}

export class BytecodeFormatError extends StackMachineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "TRUNCATED_BYTECODE", context);
    this.name = "BytecodeFormatError";
  }
}

export class NameConflictError extends StackMachineError {
  constructor(public readonly opcode: string) {
    super(`Opcode name '${opcode}' is already registered`, "NAME_CONFLICT", {
      opcode,
    });
    this.name = "NameConflictError";
  }
}

export class CodeConflictError extends StackMachineError {
  constructor(
    public readonly opcodeNumber: number,
    public readonly owner: string,
  ) {
    super(
      `Opcode value 0x${opcodeNumber.toString(16).padStart(2, "0")} is already used by ${owner}`,
      "CODE_CONFLICT",
      { opcodeNumber, owner },
    );
    this.name = "CodeConflictError";
  }
}

export class InvalidExtensionError extends StackMachineError {
  constructor(message: string) {
    super(message, "INVALID_EXTENSION");
    this.name = "InvalidExtensionError";
  }
}
