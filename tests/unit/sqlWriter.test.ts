import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { ExtractedRow } from '../../src/models/Card';
import {
  SQL_PREAMBLE,
  sqlLiteral,
  sqlPathFor,
  toInsertStatement,
  toSql,
  writeToSql,
} from '../../src/writers/sqlWriter';
import { makeTempDir, pikachuRow } from '../helpers/fixtures';

const farfetchdRow: ExtractedRow = {
  id: 'base1-27',
  name: "Farfetch'd",
  subtypes: 'Basic',
  level: '20',
  hp: '50',
  types: 'Colorless',
  weaknesses: 'Lightning(×2)',
};

describe('SQL rendering', () => {
  it('should double single quotes inside literals', () => {
    expect(sqlLiteral("Farfetch'd")).toBe("'Farfetch''d'");
    expect(sqlLiteral("''")).toBe("''''''");
    expect(sqlLiteral('')).toBe("''");
  });

  it('should list all seven columns in every INSERT', () => {
    expect(toInsertStatement(farfetchdRow)).toBe(
      'INSERT INTO pokemon_cards (id, name, subtypes, level, hp, types, weaknesses)\n' +
        "VALUES ('base1-27', 'Farfetch''d', 'Basic',\n" +
        "        '20', '50', 'Colorless', 'Lightning(×2)');\n"
    );
  });

  it('should write empty literals for blank fields', () => {
    const statement = toInsertStatement({ ...pikachuRow, level: '', weaknesses: '' });
    expect(statement.split('\n')[2]).toBe("        '', '40', 'Lightning', '');");
  });

  it('should start with the table definition followed by one INSERT per row', () => {
    const sql = toSql([pikachuRow, farfetchdRow]);

    expect(sql.startsWith(SQL_PREAMBLE)).toBe(true);
    expect(SQL_PREAMBLE).toContain('CREATE TABLE IF NOT EXISTS pokemon_cards (');
    expect(SQL_PREAMBLE).toContain('    id VARCHAR(50) PRIMARY KEY,');
    expect(SQL_PREAMBLE).toContain('    name VARCHAR(100) NOT NULL,');
    expect(sql.slice(SQL_PREAMBLE.length)).toBe(
      toInsertStatement(pikachuRow) + toInsertStatement(farfetchdRow)
    );
  });
});

describe('sqlPathFor', () => {
  it('should swap a .csv extension for .sql', () => {
    expect(sqlPathFor('all_pokemon_data.csv')).toBe('all_pokemon_data.sql');
    expect(sqlPathFor(path.join('out', 'cards.csv'))).toBe(path.join('out', 'cards.sql'));
  });

  it('should only touch the final extension', () => {
    expect(sqlPathFor('csv.exports/cards.csv')).toBe('csv.exports/cards.sql');
  });

  it('should append .sql to anything else', () => {
    expect(sqlPathFor('cards.txt')).toBe('cards.txt.sql');
    expect(sqlPathFor('cards')).toBe('cards.sql');
  });
});

describe('writeToSql', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should not create a file when there are no rows', async () => {
    const out = path.join(dir, 'cards.sql');
    expect(await writeToSql([], out)).toBe(false);
    expect(fs.existsSync(out)).toBe(false);
  });

  it('should write the rendered script', async () => {
    const out = path.join(dir, 'cards.sql');
    expect(await writeToSql([farfetchdRow], out)).toBe(true);
    expect(fs.readFileSync(out, 'utf-8')).toBe(SQL_PREAMBLE + toInsertStatement(farfetchdRow));
  });
});
