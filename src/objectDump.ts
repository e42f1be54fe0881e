import { RelocType } from "./constants";
import { formatExpression } from "./expressions";
import { decodeName, ObjectFile } from "./objectFile";

function hex(value: number): string {
  return "$" + value.toString(16);
}

/**
 * Text listing of a decoded object, one entry per line
 */
export function dumpObjectFile(file: ObjectFile): string[] {
  const out: string[] = [];
  const symbolName = (index: number) => {
    const name = file.findSymbolName(index);
    return name && decodeName(name);
  };

  if (file.programType !== undefined) {
    out.push(`Program type ${file.programType}`);
  }

  for (const section of file.sections()) {
    out.push(`Section #${section.index} ${decodeName(section.name)}`);
    out.push(`    > group      : ${section.group}`);
    out.push(`    > alignment  : ${section.alignment}`);
    if (section.spans.length > 0) {
      const spans = section.spans
        .map(({ offset, size }) => `${hex(offset)}+${size}`)
        .join(",");
      out.push(`    > data       : ${spans}`);
    }
    if (section.zeroes) {
      out.push(`    > zeroes     : ${section.zeroes}`);
    }
    if (section.uninitializedSize) {
      out.push(`    > bss        : ${section.uninitializedSize}`);
    }
  }

  for (const symbol of file.imports()) {
    out.push(`Import #${symbol.index} ${decodeName(symbol.name)}`);
  }
  for (const symbol of file.exports()) {
    out.push(
      `Export #${symbol.index} ${decodeName(symbol.name)} : section ${
        symbol.sectionIndex
      } ${hex(symbol.offset)}`
    );
  }
  for (const symbol of file.locals()) {
    out.push(
      `Local ${decodeName(symbol.name)} : section ${symbol.sectionIndex} ${hex(
        symbol.offset
      )}`
    );
  }
  for (const symbol of file.uninitialized()) {
    out.push(
      `Bss #${symbol.index} ${decodeName(symbol.name)} : section ${
        symbol.sectionIndex
      } ${hex(symbol.offset)} size ${symbol.size}`
    );
  }
  for (const [index, name] of file.filenames()) {
    out.push(`File #${index} ${decodeName(name)}`);
  }
  for (const reloc of file.relocations()) {
    out.push(
      `Reloc ${RelocType[reloc.type]} ${hex(reloc.offset)} : ${formatExpression(
        reloc.expression,
        symbolName
      )}`
    );
  }
  if (file.lineNumbers().length > 0) {
    out.push(`Line numbers : ${file.lineNumbers().length}`);
  }
  for (const fn of file.functions()) {
    out.push(
      `Function ${decodeName(fn.name)} : section ${fn.sectionIndex} ${hex(
        fn.offset
      )} lines ${fn.startLine}-${fn.endLine ?? "?"}`
    );
  }
  return out;
}
