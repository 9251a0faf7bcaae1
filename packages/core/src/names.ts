/**
 * Name table - interns identifier text per compilation
 */

import * as ts from "typescript";

/** Canonical handle for an identifier's text */
export interface Name {
  readonly text: string;
  readonly escapedText: ts.__String;
}

/**
 * Interns identifier text so that identical text maps to the identical
 * `Name` within one `ts.Program`.
 *
 * Names are handles, not nodes: the expression builder creates a fresh
 * identifier node from a name for every use site.
 */
export class NameTable {
  private static readonly tables = new WeakMap<ts.Program, NameTable>();

  /** The table shared by everything compiled in `program` */
  static instance(program: ts.Program): NameTable {
    let table = NameTable.tables.get(program);
    if (!table) {
      table = new NameTable();
      NameTable.tables.set(program, table);
    }
    return table;
  }

  private readonly names = new Map<string, Name>();

  fromString(text: string): Name {
    let name = this.names.get(text);
    if (!name) {
      name = Object.freeze({ text, escapedText: ts.escapeLeadingUnderscores(text) });
      this.names.set(text, name);
    }
    return name;
  }

  /** Number of distinct names interned so far */
  get size(): number {
    return this.names.size;
  }
}
