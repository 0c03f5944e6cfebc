import { readFile } from "node:fs/promises";
import type { Identifier } from "../../core/entities/asset";
import type { TickerSourcePort } from "../../core/ports/outboundPorts";

/**
 * Parses a ticker list: one identifier per line, blanks and `#` comments ignored.
 */
export const parseTickerList = (content: string): Identifier[] =>
  content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));

export class TickerFileSource implements TickerSourcePort {
  async read(path: string): Promise<Identifier[]> {
    const content = await readFile(path, "utf8");
    return parseTickerList(content);
  }
}
