/**
 * Capability Catalog
 *
 * Read-only lookup of known providers. Entries are validated with zod,
 * normalized (lower-cased keywords) and frozen on load.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CatalogError } from '../core/errors.js';
import { type CapabilityProvider, ProviderCategory, compareIds } from '../core/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Default catalog shipped at <package root>/catalog/default.json */
export const DEFAULT_CATALOG_PATH = join(__dirname, '..', '..', 'catalog', 'default.json');

export const CatalogEntrySchema = z.object({
  id: z.string().min(1).describe('Stable provider id'),
  name: z.string().min(1).optional().describe('Display name (defaults to id)'),
  category: z.nativeEnum(ProviderCategory),
  keywords: z.array(z.string().min(1)).min(1).describe('Declared capability keywords'),
  description: z.string().default('')
});

export const CatalogFileSchema = z.object({
  providers: z.array(CatalogEntrySchema)
});

export type CatalogEntry = z.input<typeof CatalogEntrySchema>;

export class CapabilityCatalog {
  private providers: Map<string, CapabilityProvider>;

  constructor(providers: CapabilityProvider[] = []) {
    this.providers = new Map();
    const duplicates: string[] = [];
    for (const provider of providers) {
      if (this.providers.has(provider.id)) {
        duplicates.push(`duplicate provider id "${provider.id}"`);
        continue;
      }
      this.providers.set(provider.id, provider);
    }
    if (duplicates.length > 0) {
      throw new CatalogError('constructor', duplicates);
    }
  }

  /**
   * Build a catalog from raw entries
   */
  static fromEntries(entries: unknown, source: string = 'inline'): CapabilityCatalog {
    const parsed = z.array(CatalogEntrySchema).safeParse(entries);
    if (!parsed.success) {
      throw new CatalogError(source, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
    }

    const providers = parsed.data.map(entry => toProvider(entry));
    try {
      return new CapabilityCatalog(providers);
    } catch (error) {
      if (error instanceof CatalogError) {
        throw new CatalogError(source, error.issues);
      }
      throw error;
    }
  }

  /**
   * Load a catalog JSON file ({ "providers": [...] })
   */
  static load(path: string = DEFAULT_CATALOG_PATH): CapabilityCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new CatalogError(path, [error instanceof Error ? error.message : String(error)]);
    }

    const file = CatalogFileSchema.safeParse(raw);
    if (!file.success) {
      throw new CatalogError(path, file.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
    }

    const catalog = CapabilityCatalog.fromEntries(file.data.providers, path);
    console.log(`[Catalog] Loaded ${catalog.size} providers from ${path}`);
    return catalog;
  }

  get size(): number {
    return this.providers.size;
  }

  get(id: string): CapabilityProvider | undefined {
    return this.providers.get(id);
  }

  has(id: string): boolean {
    return this.providers.has(id);
  }

  /**
   * All providers in stable id order
   */
  list(): CapabilityProvider[] {
    return Array.from(this.providers.values()).sort((a, b) => compareIds(a.id, b.id));
  }

  byCategory(category: ProviderCategory): CapabilityProvider[] {
    return this.list().filter(p => p.category === category);
  }

  categories(): Set<ProviderCategory> {
    return new Set(Array.from(this.providers.values()).map(p => p.category));
  }
}

function toProvider(entry: z.output<typeof CatalogEntrySchema>): CapabilityProvider {
  return Object.freeze({
    id: entry.id,
    name: entry.name ?? entry.id,
    category: entry.category,
    keywords: new Set(entry.keywords.map(k => k.trim().toLowerCase())),
    description: entry.description
  });
}
