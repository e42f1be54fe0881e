import { RelocType } from "./constants";
import { Expression, expressionReferences } from "./expressions";
import {
  InvalidSectionReferenceError,
  InvalidSymbolReferenceError,
} from "./errors";

export interface ByteSpan {
  /** Byte offset of the payload in the object file */
  offset: number;
  size: number;
}

export interface Section {
  index: number;
  /** Sections of the same group are laid out together */
  group: number;
  alignment: number;
  name: Buffer;
  /** File offset of the most recent code/data payload for this section */
  offset: number;
  /** Size of the most recent code/data payload */
  size: number;
  /** Every code/data payload, in file order */
  spans: ByteSpan[];
  /** Bytes of zero fill */
  zeroes: number;
  /** Bytes reserved by uninitialized (BSS) symbols */
  uninitializedSize: number;
}

export interface ImportedSymbol {
  index: number;
  name: Buffer;
}

export interface ExportedSymbol {
  index: number;
  sectionIndex: number;
  /** Offset within section */
  offset: number;
  name: Buffer;
}

export interface LocalSymbol {
  sectionIndex: number;
  offset: number;
  name: Buffer;
}

export interface UninitializedSymbol {
  index: number;
  sectionIndex: number;
  size: number;
  /** Offset within the section's uninitialized area */
  offset: number;
  name: Buffer;
}

export interface Relocation {
  type: RelocType;
  /** Absolute file offset of the location to patch */
  offset: number;
  expression: Expression;
}

export interface SourceLine {
  sectionIndex: number;
  /** Absolute file offset of the first instruction of the line */
  offset: number;
  line: number;
  fileIndex: number;
}

export interface FunctionInfo {
  sectionIndex: number;
  offset: number;
  fileIndex: number;
  startLine: number;
  endLine?: number;
  endOffset?: number;
  frameRegister: number;
  frameSize: number;
  returnPcRegister: number;
  mask: number;
  maskOffset: number;
  name: Buffer;
}

export interface BlockInfo {
  sectionIndex: number;
  startOffset: number;
  startLine: number;
  endOffset?: number;
  endLine?: number;
}

export interface SymbolDefinition {
  sectionIndex: number;
  value: number;
  storageClass: number;
  type: number;
  size: number;
  dimensions: number[];
  tag?: Buffer;
  name: Buffer;
}

export interface ResolvedExport {
  symbol: ExportedSymbol;
  section: Section;
}

/**
 * Decoded contents of a PSY-Q object file
 */
export class ObjectFile {
  public programType?: number;
  private sectionMap = new Map<number, Section>();
  private filenameMap = new Map<number, Buffer>();
  private importList: ImportedSymbol[] = [];
  private exportList: ExportedSymbol[] = [];
  private localList: LocalSymbol[] = [];
  private uninitializedList: UninitializedSymbol[] = [];
  private relocationList: Relocation[] = [];
  private lineList: SourceLine[] = [];
  private functionList: FunctionInfo[] = [];
  private blockList: BlockInfo[] = [];
  private definitionList: SymbolDefinition[] = [];

  // Mutators used while decoding:

  public setSection(section: Section) {
    this.sectionMap.set(section.index, section);
  }

  public setFilename(index: number, name: Buffer) {
    this.filenameMap.set(index, name);
  }

  public addImport(symbol: ImportedSymbol) {
    this.importList.push(symbol);
  }

  public addExport(symbol: ExportedSymbol) {
    this.exportList.push(symbol);
  }

  public addLocal(symbol: LocalSymbol) {
    this.localList.push(symbol);
  }

  public addUninitialized(symbol: UninitializedSymbol) {
    this.uninitializedList.push(symbol);
  }

  public addRelocation(relocation: Relocation) {
    this.relocationList.push(relocation);
  }

  public addLine(line: SourceLine) {
    this.lineList.push(line);
  }

  public addFunction(fn: FunctionInfo) {
    this.functionList.push(fn);
  }

  public addBlock(block: BlockInfo) {
    this.blockList.push(block);
  }

  public addDefinition(definition: SymbolDefinition) {
    this.definitionList.push(definition);
  }

  // Queries:

  /** All sections, sorted by index */
  public sections(): Section[] {
    return [...this.sectionMap.values()].sort((a, b) => a.index - b.index);
  }

  public imports(): readonly ImportedSymbol[] {
    return this.importList;
  }

  public exports(): readonly ExportedSymbol[] {
    return this.exportList;
  }

  public locals(): readonly LocalSymbol[] {
    return this.localList;
  }

  public uninitialized(): readonly UninitializedSymbol[] {
    return this.uninitializedList;
  }

  public relocations(): readonly Relocation[] {
    return this.relocationList;
  }

  public lineNumbers(): readonly SourceLine[] {
    return this.lineList;
  }

  public functions(): readonly FunctionInfo[] {
    return this.functionList;
  }

  public blocks(): readonly BlockInfo[] {
    return this.blockList;
  }

  public definitions(): readonly SymbolDefinition[] {
    return this.definitionList;
  }

  public filenames(): Map<number, Buffer> {
    return new Map(this.filenameMap);
  }

  public filename(index: number): Buffer | undefined {
    return this.filenameMap.get(index);
  }

  public findSection(index: number): Section | undefined {
    return this.sectionMap.get(index);
  }

  public getSection(index: number, context?: string): Section {
    const section = this.sectionMap.get(index);
    if (!section) {
      throw new InvalidSectionReferenceError(index, context);
    }
    return section;
  }

  /**
   * Symbol name for an index used by relocation expressions.
   * Imports, exports and uninitialized symbols share one index space.
   */
  public findSymbolName(index: number): Buffer | undefined {
    return (
      this.importList.find((s) => s.index === index)?.name ??
      this.exportList.find((s) => s.index === index)?.name ??
      this.uninitializedList.find((s) => s.index === index)?.name
    );
  }

  public isEmpty(): boolean {
    return (
      this.sectionMap.size === 0 &&
      this.importList.length === 0 &&
      this.exportList.length === 0 &&
      this.relocationList.length === 0
    );
  }

  /**
   * Pair every export with its section, failing on a dangling section index
   */
  public resolveExports(): ResolvedExport[] {
    return this.exportList.map((symbol) => ({
      symbol,
      section: this.getSection(
        symbol.sectionIndex,
        `export ${decodeName(symbol.name)}`
      ),
    }));
  }

  /**
   * Check every section and symbol index referenced by the decoded records
   */
  public validateReferences(): void {
    this.resolveExports();
    for (const symbol of this.localList) {
      this.getSection(symbol.sectionIndex, `local ${decodeName(symbol.name)}`);
    }
    for (const symbol of this.uninitializedList) {
      this.getSection(
        symbol.sectionIndex,
        `uninitialized ${decodeName(symbol.name)}`
      );
    }
    for (const relocation of this.relocationList) {
      const context = `relocation at $${relocation.offset.toString(16)}`;
      const { symbols, sections } = expressionReferences(relocation.expression);
      for (const sectionIndex of sections) {
        this.getSection(sectionIndex, context);
      }
      for (const symbolIndex of symbols) {
        if (this.findSymbolName(symbolIndex) === undefined) {
          throw new InvalidSymbolReferenceError(symbolIndex, context);
        }
      }
    }
  }
}

/**
 * Names are raw bytes in the file; this renders them one char per byte
 */
export function decodeName(name: Buffer): string {
  return name.toString("latin1");
}
