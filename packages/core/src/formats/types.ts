/**
 * Format adapter interfaces
 */

import type { FormatName, FormatOptionValue } from "../compiler/weft/ast.js";
import type { UDMNode } from "../udm/node.js";

export type FormatOptions = Readonly<Record<string, FormatOptionValue>>;

export interface FormatParser {
  parse(text: string, options?: FormatOptions): UDMNode;
}

export interface FormatSerializer {
  serialize(node: UDMNode, options?: FormatOptions): string;
}

export interface FormatAdapter extends FormatParser, FormatSerializer {
  readonly name: Exclude<FormatName, "auto">;
}
