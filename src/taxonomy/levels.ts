/**
 * Tag Levels
 *
 * Level 1 tags are the broad categories. Level 2 tags each belong to one
 * parent category. Anything else the enrichment model invents is level 3.
 * Level 1 and 2 names are canonical: the taxonomy agent never retires or
 * renames them.
 */

import { slugify } from './slug.js';
import type { TagLevel } from '../types/index.js';

export interface TaxonomyDefinition {
  levelOne: readonly string[];
  /** Parent category → its level 2 tags */
  categories: Readonly<Record<string, readonly string[]>>;
}

export interface TagPlacement {
  level: TagLevel;
  /** Parent category of a level 2 tag */
  category: string | null;
}

interface CatalogEntry extends TagPlacement {
  name: string;
}

const UNSTRUCTURED: TagPlacement = { level: 3, category: null };

export class TagCatalog {
  private readonly bySlug = new Map<string, CatalogEntry>();

  constructor(definition: TaxonomyDefinition) {
    for (const name of definition.levelOne) {
      this.bySlug.set(slugify(name), { name, level: 1, category: null });
    }
    for (const [category, names] of Object.entries(definition.categories)) {
      for (const name of names) {
        this.bySlug.set(slugify(name), { name, level: 2, category });
      }
    }
  }

  get canonicalTags(): string[] {
    return [...this.bySlug.values()].map((entry) => entry.name);
  }

  /** Exact canonical spelling, not a variant of it */
  isCanonical(name: string): boolean {
    return this.bySlug.get(slugify(name))?.name === name;
  }

  /** Matched by slug, so variant spellings share the canonical placement */
  placement(name: string): TagPlacement {
    const entry = this.bySlug.get(slugify(name));
    return entry ? { level: entry.level, category: entry.category } : UNSTRUCTURED;
  }
}
