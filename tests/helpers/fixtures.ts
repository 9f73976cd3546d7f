import fs from 'fs';
import os from 'os';
import path from 'path';

import type { ExtractedRow } from '../../src/models/Card';

export const pikachuCard = {
  id: 'base1-58',
  name: 'Pikachu',
  supertype: 'Pokémon',
  subtypes: ['Basic'],
  level: '12',
  hp: '40',
  types: ['Lightning'],
  weaknesses: [{ type: 'Fighting', value: '×2' }],
};

export const charmanderCard = {
  id: 'base1-46',
  name: 'Charmander',
  supertype: 'Pokémon',
  subtypes: ['Basic'],
  hp: '50',
  types: ['Fire'],
  weaknesses: [{ type: 'Water', value: '×2' }],
};

export const billCard = {
  id: 'base1-91',
  name: 'Bill',
  supertype: 'Trainer',
};

export const pikachuRow: ExtractedRow = {
  id: 'base1-58',
  name: 'Pikachu',
  subtypes: 'Basic',
  level: '12',
  hp: '40',
  types: 'Lightning',
  weaknesses: 'Fighting(×2)',
};

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'card-extract-'));
}

export function writeJson(dir: string, name: string, data: unknown): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, JSON.stringify(data), 'utf-8');
  return filePath;
}
