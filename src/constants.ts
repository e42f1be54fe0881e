/**
 * Tag values of the PSY-Q "LNK" object format
 *
 * @see {@link https://github.com/grumpycoders/pcsx-redux/blob/main/tools/psyq-obj-parser/psyq-obj-parser.cc}
 */

export const MAGIC = Buffer.from("LNK\x02", "latin1");

/** Record opcodes */
export enum Opcode {
  END = 0,
  BYTES = 2,
  SWITCH = 6,
  ZEROES = 8,
  RELOCATION = 10,
  EXPORTED_SYMBOL = 12,
  IMPORTED_SYMBOL = 14,
  SECTION = 16,
  LOCAL_SYMBOL = 18,
  FILENAME = 28,
  PROGRAMTYPE = 46,
  UNINITIALIZED = 48,
  INC_SLD_LINENUM = 50,
  INC_SLD_LINENUM_BY_BYTE = 52,
  INC_SLD_LINENUM_BY_WORD = 54,
  SET_SLD_LINENUM = 56,
  SET_SLD_LINENUM_FILE = 58,
  END_SLD = 60,
  FUNCTION = 74,
  FUNCTION_END = 76,
  BLOCK_START = 78,
  BLOCK_END = 80,
  SECTION_DEF = 82,
  SECTION_DEF2 = 84,
}

export enum RelocType {
  REL32_BE = 8,
  REL32 = 16,
  REL26 = 74,
  HI16 = 82,
  LO16 = 84,
  REL26_BE = 92,
  HI16_BE = 96,
  LO16_BE = 98,
  GPREL16 = 100,
}

/** Relocation target expression opcodes */
export enum ExprOpcode {
  VALUE = 0,
  SYMBOL = 2,
  SECTION_BASE = 4,
  SECTION_START = 12,
  SECTION_END = 22,
  ADD = 44,
  SUB = 46,
  DIV = 50,
}

/** Program type values written by the PSY-Q assemblers and compilers */
export const KNOWN_PROGRAM_TYPES: readonly number[] = [7, 9];

export function isOpcode(value: number): value is Opcode {
  return Opcode[value] !== undefined;
}

export function isRelocType(value: number): value is RelocType {
  return RelocType[value] !== undefined;
}

export function isExprOpcode(value: number): value is ExprOpcode {
  return ExprOpcode[value] !== undefined;
}
