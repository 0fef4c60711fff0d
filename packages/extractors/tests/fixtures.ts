import { readFileSync } from 'node:fs';
import { createPage, type Page, type PageInput } from '../src/page.js';

export function loadFixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8');
}

export function fixturePage(name: string, input: Omit<PageInput, 'body'>): Page {
  return createPage({ ...input, body: loadFixture(name) });
}
