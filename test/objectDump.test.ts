import { RelocType } from "../src/constants";
import { dumpObjectFile } from "../src/objectDump";
import { parsePsyqObject } from "../src/psyqObjParser";
import { NullDiagnostics } from "../src/logger";
import { ObjectBuilder } from "./helpers/objectBuilder";

describe("dumpObjectFile", () => {
  it("lists the decoded records", () => {
    const file = parsePsyqObject(
      new ObjectBuilder()
        .programType(7)
        .section(1, ".text", 0, 8)
        .importSymbol(2, "printf")
        .exportSymbol(3, 1, 0x10, "main")
        .switchTo(1)
        .data([0, 0, 0, 0])
        .relocation(RelocType.REL26, 0, { type: "symbol", symbolIndex: 2 })
        .relocation(RelocType.HI16, 2, {
          type: "add",
          left: { type: "sectionBase", sectionIndex: 1 },
          right: { type: "value", value: 0x20 },
        })
        .end()
        .build(),
      { diagnostics: new NullDiagnostics() }
    );
    // payload starts after 4 magic + 2 + 12 + 10 + 14 + 3 + 3 bytes
    expect(dumpObjectFile(file)).toEqual([
      "Program type 7",
      "Section #1 .text",
      "    > group      : 0",
      "    > alignment  : 8",
      "    > data       : $30+4",
      "Import #2 printf",
      "Export #3 main : section 1 $10",
      "Reloc REL26 $30 : printf",
      "Reloc HI16 $32 : (sectionBase(1) + $20)",
    ]);
  });
});
