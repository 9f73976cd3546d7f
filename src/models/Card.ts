/**
 * Pokémon Card Extractor – Card Model
 *
 * PURPOSE:
 *   Describes the raw card records found in the input JSON and the flat row written to CSV/SQL,
 *   and maps one onto the other.
 *
 * FIELD OVERVIEW:
 *   - id:          Card identifier (e.g. "base1-58"), primary key in the SQL table
 *   - name:        Card name
 *   - subtypes:    e.g. ["Basic"], ["Stage 1"], rendered "Basic, Stage 1"
 *   - level:       Level string (older sets only)
 *   - hp:          Hit points; usually a string, some dumps carry a number
 *   - types:       Energy types, e.g. ["Lightning"]
 *   - weaknesses:  [{ type: "Fire", value: "×2" }], rendered "Fire(×2)"
 *
 * Input is untyped JSON, so every accessor takes `unknown` and falls back to "" rather than
 * trusting the shape.
 */

/** Only records whose supertype is exactly this string are extracted (no normalization). */
export const POKEMON_SUPERTYPE = 'Pokémon';

export interface RawCard {
  id?: unknown;
  name?: unknown;
  supertype?: unknown;
  subtypes?: unknown;
  level?: unknown;
  hp?: unknown;
  types?: unknown;
  weaknesses?: unknown;
}

export interface ExtractedRow {
  id: string;
  name: string;
  subtypes: string;
  level: string;
  hp: string;
  types: string;
  weaknesses: string;
}

export const ROW_COLUMNS = [
  'id',
  'name',
  'subtypes',
  'level',
  'hp',
  'types',
  'weaknesses',
] as const satisfies readonly (keyof ExtractedRow)[];

const LIST_SEPARATOR = ', ';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Strings pass through, numbers and booleans become their text form, anything else is "". */
export function textField(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

export function joinList(value: unknown): string {
  if (!Array.isArray(value)) return '';
  return value
    .filter((item) => typeof item === 'string' || typeof item === 'number')
    .map(textField)
    .join(LIST_SEPARATOR);
}

export function formatWeaknesses(value: unknown): string {
  if (!Array.isArray(value)) return '';
  return value
    .filter(isRecord)
    .map((weakness) => `${textField(weakness.type)}(${textField(weakness.value)})`)
    .join(LIST_SEPARATOR);
}

export function isPokemonCard(record: unknown): record is RawCard {
  return isRecord(record) && record.supertype === POKEMON_SUPERTYPE;
}

export function toExtractedRow(card: RawCard): ExtractedRow {
  return {
    id: textField(card.id),
    name: textField(card.name),
    subtypes: joinList(card.subtypes),
    level: textField(card.level),
    hp: textField(card.hp),
    types: joinList(card.types),
    weaknesses: formatWeaknesses(card.weaknesses),
  };
}
