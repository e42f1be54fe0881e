/**
 * Parses PSY-Q "LNK" object files
 *
 * The file is a 4 byte magic followed by a stream of records, each introduced by
 * an opcode byte. Some records depend on state set by earlier ones: BYTES,
 * ZEROES, RELOCATION and the SLD line records apply to the section chosen by
 * the last SWITCH.
 *
 * @see {@link https://github.com/grumpycoders/pcsx-redux/blob/main/tools/psyq-obj-parser/psyq-obj-parser.cc}
 */

import { readFile } from "fs/promises";
import { URI as Uri } from "vscode-uri";
import { BufferReader } from "./bufferReader";
import {
  isOpcode,
  isRelocType,
  KNOWN_PROGRAM_TYPES,
  MAGIC,
  Opcode,
} from "./constants";
import {
  formatOffset,
  InvalidMagicError,
  NoCurrentSectionError,
  UnknownOpcodeError,
  UnknownRelocationTypeError,
} from "./errors";
import { parseExpression } from "./expressions";
import { Diagnostics, LoggerDiagnostics, Severity } from "./logger";
import { decodeName, ObjectFile, Section } from "./objectFile";

export interface ParserOptions {
  /** Receives warnings, and the per-record trace when enabled (default: debug adapter logger) */
  diagnostics?: Diagnostics;
  /** Report each record as it is decoded */
  trace?: boolean;
}

/**
 * State carried between records while decoding one file
 */
interface ParseContext {
  reader: BufferReader;
  file: ObjectFile;
  diagnostics: Diagnostics;
  /** Section selected by the last SWITCH record */
  currentSection?: number;
  sldLine: number;
  sldFile: number;
}

/**
 * Check 'magic cookie' at start of data
 */
export function isPsyqObject(data: Uint8Array): boolean {
  return (
    data.length >= MAGIC.length &&
    Buffer.compare(data.subarray(0, MAGIC.length), MAGIC) === 0
  );
}

/**
 * Extract object file contents from a file on disk
 */
export async function parsePsyqObjectFromFile(
  file: string | Uri,
  options: ParserOptions = {}
): Promise<ObjectFile> {
  const filename = typeof file === "string" ? file : file.fsPath;
  const buffer = await readFile(filename);
  return parsePsyqObject(buffer, options);
}

/**
 * Extract object file contents from PSY-Q object data
 */
export function parsePsyqObject(
  contents: Buffer,
  options: ParserOptions = {}
): ObjectFile {
  if (!isPsyqObject(contents)) {
    throw new InvalidMagicError();
  }
  const reader = new BufferReader(contents);
  reader.skip(MAGIC.length);

  const ctx: ParseContext = {
    reader,
    file: new ObjectFile(),
    diagnostics: options.diagnostics ?? new LoggerDiagnostics(),
    sldLine: 0,
    sldFile: 0,
  };
  const trace = options.trace
    ? (start: number, opcode: Opcode) =>
        ctx.diagnostics.report(
          Severity.VERBOSE,
          `Record ${Opcode[opcode]} offset ${formatOffset(start)}`
        )
    : undefined;

  while (!reader.finished()) {
    const start = reader.offset();
    const opcode = reader.readByte();
    if (!isOpcode(opcode)) {
      reader.seek(start);
      throw new UnknownOpcodeError(start, opcode);
    }
    trace?.(start, opcode);
    if (opcode === Opcode.END) {
      if (!reader.finished()) {
        ctx.diagnostics.report(
          Severity.VERBOSE,
          `${reader.remaining()} byte(s) after END record ignored`
        );
      }
      break;
    }
    parseRecord(opcode, start, ctx);
  }
  return ctx.file;
}

function parseRecord(
  opcode: Exclude<Opcode, Opcode.END>,
  start: number,
  ctx: ParseContext
) {
  const { reader, file } = ctx;
  switch (opcode) {
    case Opcode.PROGRAMTYPE:
      parseProgramType(ctx);
      break;

    // Definitions:
    case Opcode.SECTION:
      // uint16   Section index
      // uint16   Group
      // uint8    Alignment
      // pstring  Name
      file.setSection({
        index: reader.readWord(),
        group: reader.readWord(),
        alignment: reader.readByte(),
        name: reader.readName(),
        offset: 0,
        size: 0,
        spans: [],
        zeroes: 0,
        uninitializedSize: 0,
      });
      break;
    case Opcode.IMPORTED_SYMBOL:
      file.addImport({
        index: reader.readWord(),
        name: reader.readName(),
      });
      break;
    case Opcode.EXPORTED_SYMBOL:
      // Section isn't checked here: it may be defined later in the file
      file.addExport({
        index: reader.readWord(),
        sectionIndex: reader.readWord(),
        offset: reader.readLong(),
        name: reader.readName(),
      });
      break;
    case Opcode.LOCAL_SYMBOL:
      file.addLocal({
        sectionIndex: reader.readWord(),
        offset: reader.readLong(),
        name: reader.readName(),
      });
      break;
    case Opcode.UNINITIALIZED:
      parseUninitialized(ctx);
      break;
    case Opcode.FILENAME:
      file.setFilename(reader.readWord(), reader.readName());
      break;

    // Section contents:
    case Opcode.SWITCH:
      ctx.currentSection = reader.readWord();
      break;
    case Opcode.BYTES: {
      const section = currentSection(ctx, start);
      const size = reader.readWord();
      section.offset = reader.offset();
      section.size = size;
      section.spans.push({ offset: section.offset, size });
      // Payload isn't kept - consumers can read it back using offset/size
      reader.skip(size);
      break;
    }
    case Opcode.ZEROES: {
      const section = currentSection(ctx, start);
      section.zeroes += reader.readLong();
      break;
    }
    case Opcode.RELOCATION:
      parseRelocation(ctx, start);
      break;

    // Source level debug info:
    case Opcode.INC_SLD_LINENUM:
      addLine(ctx, start, reader.readWord(), 1);
      break;
    case Opcode.INC_SLD_LINENUM_BY_BYTE: {
      const offset = reader.readWord();
      addLine(ctx, start, offset, reader.readByte());
      break;
    }
    case Opcode.INC_SLD_LINENUM_BY_WORD: {
      const offset = reader.readWord();
      addLine(ctx, start, offset, reader.readWord());
      break;
    }
    case Opcode.SET_SLD_LINENUM: {
      const offset = reader.readWord();
      ctx.sldLine = reader.readLong();
      addLine(ctx, start, offset, 0);
      break;
    }
    case Opcode.SET_SLD_LINENUM_FILE: {
      const offset = reader.readWord();
      ctx.sldLine = reader.readLong();
      ctx.sldFile = reader.readWord();
      addLine(ctx, start, offset, 0);
      break;
    }
    case Opcode.END_SLD:
      reader.skip(2);
      break;
    case Opcode.FUNCTION:
    case Opcode.FUNCTION_END:
    case Opcode.BLOCK_START:
    case Opcode.BLOCK_END:
    case Opcode.SECTION_DEF:
    case Opcode.SECTION_DEF2:
      parseDebugSymbol(opcode, ctx);
      break;
  }
}

/**
 * Look up the section chosen by the last SWITCH record
 */
function currentSection(ctx: ParseContext, recordOffset: number): Section {
  if (ctx.currentSection === undefined) {
    throw new NoCurrentSectionError(recordOffset);
  }
  const section = ctx.file.findSection(ctx.currentSection);
  if (!section) {
    throw new NoCurrentSectionError(recordOffset, ctx.currentSection);
  }
  return section;
}

function parseProgramType({ reader, file, diagnostics }: ParseContext) {
  const value = reader.readByte();
  if (!KNOWN_PROGRAM_TYPES.includes(value)) {
    diagnostics.report(Severity.WARN, `Unknown program type: ${value}`);
  }
  file.programType = value;
}

function parseUninitialized(ctx: ParseContext) {
  // uint16   Symbol index
  // uint16   Section index
  // uint32   Size
  // pstring  Name
  const { reader, file } = ctx;
  const index = reader.readWord();
  const sectionIndex = reader.readWord();
  const size = reader.readLong();
  const name = reader.readName();

  // Space is allocated at the end of the section's BSS area, if defined yet
  const section = file.findSection(sectionIndex);
  const offset = section?.uninitializedSize ?? 0;
  if (section) {
    section.uninitializedSize += size;
  } else {
    ctx.diagnostics.report(
      Severity.WARN,
      `Uninitialized symbol ${decodeName(name)} in undefined section ${sectionIndex}`
    );
  }
  file.addUninitialized({ index, sectionIndex, size, offset, name });
}

function parseRelocation(ctx: ParseContext, start: number) {
  // uint8    Relocation type
  // uint16   Offset within current section data
  // expr     Target value
  const { reader, file } = ctx;
  const section = currentSection(ctx, start);
  const typeOffset = reader.offset();
  const type = reader.readByte();
  if (!isRelocType(type)) {
    reader.seek(typeOffset);
    throw new UnknownRelocationTypeError(typeOffset, type);
  }
  const offset = reader.readWord() + section.offset;
  const expression = parseExpression(reader);
  file.addRelocation({ type, offset, expression });
}

function addLine(
  ctx: ParseContext,
  start: number,
  rawOffset: number,
  increment: number
) {
  const section = currentSection(ctx, start);
  ctx.sldLine += increment;
  ctx.file.addLine({
    sectionIndex: section.index,
    offset: section.offset + rawOffset,
    line: ctx.sldLine,
    fileIndex: ctx.sldFile,
  });
}

function parseDebugSymbol(
  opcode:
    | Opcode.FUNCTION
    | Opcode.FUNCTION_END
    | Opcode.BLOCK_START
    | Opcode.BLOCK_END
    | Opcode.SECTION_DEF
    | Opcode.SECTION_DEF2,
  { reader, file }: ParseContext
) {
  const sectionIndex = reader.readWord();
  switch (opcode) {
    case Opcode.FUNCTION:
      file.addFunction({
        sectionIndex,
        offset: reader.readLong(),
        fileIndex: reader.readWord(),
        startLine: reader.readLong(),
        frameRegister: reader.readWord(),
        frameSize: reader.readLong(),
        returnPcRegister: reader.readWord(),
        mask: reader.readLong(),
        maskOffset: reader.readInt32(),
        name: reader.readName(),
      });
      break;
    case Opcode.FUNCTION_END: {
      const endOffset = reader.readLong();
      const endLine = reader.readLong();
      const fn = [...file.functions()]
        .reverse()
        .find((f) => f.sectionIndex === sectionIndex && f.endLine === undefined);
      if (fn) {
        fn.endOffset = endOffset;
        fn.endLine = endLine;
      }
      break;
    }
    case Opcode.BLOCK_START:
      file.addBlock({
        sectionIndex,
        startOffset: reader.readLong(),
        startLine: reader.readLong(),
      });
      break;
    case Opcode.BLOCK_END: {
      const endOffset = reader.readLong();
      const endLine = reader.readLong();
      const block = [...file.blocks()]
        .reverse()
        .find((b) => b.sectionIndex === sectionIndex && b.endLine === undefined);
      if (block) {
        block.endOffset = endOffset;
        block.endLine = endLine;
      }
      break;
    }
    case Opcode.SECTION_DEF:
    case Opcode.SECTION_DEF2: {
      // uint32   Value
      // uint16   Storage class
      // uint16   Type
      // uint32   Size
      // SECTION_DEF2 only:
      //   uint16       Dimension count N
      //   uint16 * N   Dimensions
      //   pstring      Tag
      // pstring  Name
      const value = reader.readLong();
      const storageClass = reader.readWord();
      const type = reader.readWord();
      const size = reader.readLong();
      const dimensions: number[] = [];
      let tag: Buffer | undefined;
      if (opcode === Opcode.SECTION_DEF2) {
        const count = reader.readWord();
        for (let i = 0; i < count; i++) {
          dimensions.push(reader.readWord());
        }
        tag = reader.readName();
      }
      file.addDefinition({
        sectionIndex,
        value,
        storageClass,
        type,
        size,
        dimensions,
        tag,
        name: reader.readName(),
      });
      break;
    }
  }
}
