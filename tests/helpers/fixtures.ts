/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

/**
 * Read a fixture file's contents
 */
export async function readFixture(...parts: string[]): Promise<string> {
  return fs.promises.readFile(getFixturePath(...parts), 'utf-8');
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'drafter-lens-'));

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => path.join(rootDir, relativePath);

  return { rootDir, cleanup, addFile, getFilePath };
}

/**
 * A small Drafter site: two records and two linked routes
 */
export const SAMPLE_SITE = `from dataclasses import dataclass
from drafter import *


@dataclass
class Item:
    name: str


@dataclass
class State:
    items: list[Item]
    count: int


@route
def index(state: State) -> Page:
    return Page(state, [Text(state.count), Button("Next", "details")])


@route
def details(state: State) -> Page:
    return Page(state, [Link("Back", index)])
`;
