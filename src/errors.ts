export type ErrorKind =
  | "TruncatedInput"
  | "InvalidMagic"
  | "UnknownOpcode"
  | "UnknownRelocationType"
  | "UnknownExpressionOpcode"
  | "ExpressionTooDeep"
  | "NoCurrentSection"
  | "InvalidSectionReference"
  | "InvalidSymbolReference";

export function formatOffset(offset: number): string {
  return "$" + offset.toString(16);
}

/**
 * Base for all decoding and resolution failures.
 *
 * `offset` is the byte position in the object file the failure relates to, or
 * undefined for errors raised against an already decoded model.
 */
export class PsyqObjectError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly offset?: number
  ) {
    super(
      offset === undefined
        ? `${kind}: ${message}`
        : `${kind} at offset ${formatOffset(offset)}: ${message}`
    );
    this.name = new.target.name;
  }
}

export class TruncatedInputError extends PsyqObjectError {
  constructor(
    offset: number,
    public readonly needed: number,
    public readonly available: number
  ) {
    super(
      "TruncatedInput",
      `need ${needed} byte(s), ${available} available`,
      offset
    );
  }
}

export class InvalidMagicError extends PsyqObjectError {
  constructor() {
    super("InvalidMagic", "Not a valid PSY-Q object file", 0);
  }
}

export class UnknownOpcodeError extends PsyqObjectError {
  constructor(offset: number, public readonly opcode: number) {
    super("UnknownOpcode", `unknown record opcode ${opcode}`, offset);
  }
}

export class UnknownRelocationTypeError extends PsyqObjectError {
  constructor(offset: number, public readonly relocType: number) {
    super(
      "UnknownRelocationType",
      `unknown relocation type ${relocType}`,
      offset
    );
  }
}

export class UnknownExpressionOpcodeError extends PsyqObjectError {
  constructor(offset: number, public readonly opcode: number) {
    super(
      "UnknownExpressionOpcode",
      `unknown expression opcode ${opcode}`,
      offset
    );
  }
}

export class ExpressionTooDeepError extends PsyqObjectError {
  constructor(offset: number, maxDepth: number) {
    super(
      "ExpressionTooDeep",
      `expression nested deeper than ${maxDepth}`,
      offset
    );
  }
}

export class NoCurrentSectionError extends PsyqObjectError {
  constructor(offset: number, sectionIndex?: number) {
    super(
      "NoCurrentSection",
      sectionIndex === undefined
        ? "no section selected"
        : `selected section ${sectionIndex} is not defined`,
      offset
    );
  }
}

export class InvalidSectionReferenceError extends PsyqObjectError {
  constructor(public readonly sectionIndex: number, context?: string) {
    super(
      "InvalidSectionReference",
      `section ${sectionIndex} is not defined` +
        (context ? ` (referenced by ${context})` : "")
    );
  }
}

export class InvalidSymbolReferenceError extends PsyqObjectError {
  constructor(public readonly symbolIndex: number, context?: string) {
    super(
      "InvalidSymbolReference",
      `symbol ${symbolIndex} is not defined` +
        (context ? ` (referenced by ${context})` : "")
    );
  }
}
