export * from "./errors";
export { Stack } from "./Stack";
export {
  StackMachine,
  TRACE_STACK_LIMIT,
  formatTraceLine,
} from "./StackMachine";
export type {
  ExecuteOptions,
  ExecutionStats,
  MachineState,
  RunResult,
  RunStatus,
} from "./StackMachine";
export type {
  SMInputOutputDevice,
  StepSignal,
  TraceSnapshot,
} from "./SMInputOutputDevice";
export { SMConsole } from "./SMConsole";
export { Assembler } from "./Assembler";
export type { AssemblyResult, ScanResult, SourceLine } from "./Assembler";
export {
  BytecodeCodec,
  HEADER_SIZE,
  MAGIC,
  RECORD_SIZE,
  VERSION,
  instructionOffset,
} from "./Bytecode";
export type { DecodedRecord } from "./Bytecode";
export { Disassembler } from "./Disassembler";
export type {
  AnnotationMode,
  DisassembleOptions,
  DisassemblyResult,
} from "./Disassembler";
export {
  OpcodeRegistry,
  createRegistry,
  registerExtensions,
} from "./opcodes/registry";
export type {
  ExtensionSource,
  RegistrationReport,
  RegistryOptions,
  RejectedExtension,
} from "./opcodes/registry";
export { loadExtensionDirectory } from "./opcodes/loader";
export { BASE_OPCODES } from "./opcodes/tables";
export type {
  ExecCtx,
  ExtensionDefinition,
  Instruction,
  MachineContext,
  OpcodeDescriptor,
  OpcodeHandler,
  Operand,
  Program,
} from "./opcodes/types";
export { BUILTIN_EXTENSIONS } from "./extensions";
export {
  compileFile,
  disassembleFile,
  loadBytecodeFile,
  runFile,
} from "./toolchain";
export type { CompileResult, RunFileResult } from "./toolchain";
