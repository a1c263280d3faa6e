/**
 * Message fixtures for tests, stored as .xml text beside this file.
 */
import { readFileSync } from "node:fs";

export type FixtureName =
  | "classic-history"
  | "classic-reading"
  | "envy-history"
  | "envy-reading";

/**
 * Read a fixture message, without its trailing newline.
 */
export function loadFixture(name: FixtureName): string {
  return readFileSync(new URL(`./${name}.xml`, import.meta.url), "utf8").trim();
}
