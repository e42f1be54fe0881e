import { ExprOpcode, MAGIC, Opcode, RelocType } from "../../src/constants";
import { Expression } from "../../src/expressions";
import { ObjectFile } from "../../src/objectFile";

/**
 * Assembles PSY-Q object bytes record by record
 */
export class ObjectBuilder {
  private bytes: number[];

  constructor(magic: boolean = true) {
    this.bytes = magic ? [...MAGIC] : [];
  }

  get length(): number {
    return this.bytes.length;
  }

  raw(...values: number[]): this {
    this.bytes.push(...values);
    return this;
  }

  byte(value: number): this {
    return this.raw(value & 0xff);
  }

  word(value: number): this {
    return this.raw(value & 0xff, (value >> 8) & 0xff);
  }

  long(value: number): this {
    return this.raw(
      value & 0xff,
      (value >> 8) & 0xff,
      (value >> 16) & 0xff,
      (value >>> 24) & 0xff
    );
  }

  name(name: string | Buffer): this {
    const data = typeof name === "string" ? Buffer.from(name, "latin1") : name;
    return this.byte(data.length).raw(...data);
  }

  programType(type: number): this {
    return this.byte(Opcode.PROGRAMTYPE).byte(type);
  }

  section(index: number, name: string | Buffer, group = 0, alignment = 8) {
    return this.byte(Opcode.SECTION)
      .word(index)
      .word(group)
      .byte(alignment)
      .name(name);
  }

  importSymbol(index: number, name: string | Buffer): this {
    return this.byte(Opcode.IMPORTED_SYMBOL).word(index).name(name);
  }

  exportSymbol(
    index: number,
    sectionIndex: number,
    offset: number,
    name: string | Buffer
  ): this {
    return this.byte(Opcode.EXPORTED_SYMBOL)
      .word(index)
      .word(sectionIndex)
      .long(offset)
      .name(name);
  }

  localSymbol(sectionIndex: number, offset: number, name: string): this {
    return this.byte(Opcode.LOCAL_SYMBOL)
      .word(sectionIndex)
      .long(offset)
      .name(name);
  }

  uninitialized(
    index: number,
    sectionIndex: number,
    size: number,
    name: string | Buffer
  ): this {
    return this.byte(Opcode.UNINITIALIZED)
      .word(index)
      .word(sectionIndex)
      .long(size)
      .name(name);
  }

  filename(index: number, name: string | Buffer): this {
    return this.byte(Opcode.FILENAME).word(index).name(name);
  }

  switchTo(sectionIndex: number): this {
    return this.byte(Opcode.SWITCH).word(sectionIndex);
  }

  data(payload: number[]): this {
    return this.byte(Opcode.BYTES).word(payload.length).raw(...payload);
  }

  zeroes(size: number): this {
    return this.byte(Opcode.ZEROES).long(size);
  }

  relocation(type: RelocType, offset: number, expression: Expression): this {
    return this.byte(Opcode.RELOCATION)
      .byte(type)
      .word(offset)
      .expression(expression);
  }

  expression(expression: Expression): this {
    switch (expression.type) {
      case "value":
        return this.byte(ExprOpcode.VALUE).long(expression.value);
      case "symbol":
        return this.byte(ExprOpcode.SYMBOL).word(expression.symbolIndex);
      case "sectionBase":
        return this.byte(ExprOpcode.SECTION_BASE).word(expression.sectionIndex);
      case "sectionStart":
        return this.byte(ExprOpcode.SECTION_START).word(
          expression.sectionIndex
        );
      case "sectionEnd":
        return this.byte(ExprOpcode.SECTION_END).word(expression.sectionIndex);
      case "add":
      case "sub":
      case "div": {
        const opcodes = {
          add: ExprOpcode.ADD,
          sub: ExprOpcode.SUB,
          div: ExprOpcode.DIV,
        };
        return this.byte(opcodes[expression.type])
          .expression(expression.right)
          .expression(expression.left);
      }
    }
  }

  end(): this {
    return this.byte(Opcode.END);
  }

  build(): Buffer {
    return Buffer.from(this.bytes);
  }
}

/**
 * Write a decoded object back out as records.
 *
 * Each section gets one SWITCH + BYTES (zero filled, payloads aren't kept),
 * followed by its ZEROES and the relocations that fall after its payload start.
 */
export function encodeObjectFile(file: ObjectFile): Buffer {
  const builder = new ObjectBuilder();
  if (file.programType !== undefined) {
    builder.programType(file.programType);
  }
  const sections = file.sections();
  for (const section of sections) {
    builder.section(
      section.index,
      section.name,
      section.group,
      section.alignment
    );
  }
  for (const symbol of file.imports()) {
    builder.importSymbol(symbol.index, symbol.name);
  }
  for (const symbol of file.exports()) {
    builder.exportSymbol(
      symbol.index,
      symbol.sectionIndex,
      symbol.offset,
      symbol.name
    );
  }

  // Relocations belong to the section with the nearest payload start before them
  const byPayload = sections
    .filter((s) => s.spans.length > 0)
    .sort((a, b) => a.offset - b.offset);
  const owner = (offset: number) =>
    [...byPayload].reverse().find((s) => s.offset <= offset);

  for (const section of byPayload) {
    builder.switchTo(section.index);
    builder.data(new Array<number>(section.size).fill(0));
    if (section.zeroes) {
      builder.zeroes(section.zeroes);
    }
    for (const reloc of file.relocations()) {
      if (owner(reloc.offset) === section) {
        builder.relocation(
          reloc.type,
          reloc.offset - section.offset,
          reloc.expression
        );
      }
    }
  }
  return builder.end().build();
}

/**
 * Plain comparable view of a decoded object
 */
export function modelOf(file: ObjectFile) {
  return {
    programType: file.programType,
    sections: file.sections().map(({ index, group, alignment, name, size }) => ({
      index,
      group,
      alignment,
      name,
      size,
    })),
    imports: file.imports(),
    exports: file.exports(),
    relocations: file.relocations().map((reloc) => {
      const section = file
        .sections()
        .filter((s) => s.spans.length > 0 && s.offset <= reloc.offset)
        .sort((a, b) => b.offset - a.offset)[0];
      return {
        type: reloc.type,
        section: section?.index,
        sectionOffset: reloc.offset - (section?.offset ?? 0),
        expression: reloc.expression,
      };
    }),
  };
}
