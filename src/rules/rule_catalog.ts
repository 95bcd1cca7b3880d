/**
 * @fileoverview Rule catalog
 *
 * Immutable, validated set of rules keyed by id. "Catalog order" is the order
 * of ids under code-unit comparison; it decides the position of mandatory
 * rules and breaks score ties during selection.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { NotFoundError, RuleCatalogError } from '../core/errors.js';
import { RuleCategorySchema, type Rule } from '../types.js';
import { compareIds } from '../utils/compare.js';

// ============================================================================
// DEFINITIONS
// ============================================================================

export const RuleDefinitionSchema = z.object({
  id: z.string().min(1).regex(/^[A-Za-z0-9_.-]+$/, 'rule ids use letters, digits, "_", "." and "-"'),
  title: z.string().min(1),
  category: RuleCategorySchema,
  description: z.string().default(''),
  tags: z.array(z.string().min(1)).default([]),
  mandatory: z.boolean().default(false),
}).strict();

export type RuleDefinition = z.input<typeof RuleDefinitionSchema>;

export interface RuleCatalogOptions {
  /** Label reported by status; defaults to a content hash. */
  version?: string;
  /** File or directory the definitions came from, for error messages. */
  source?: string;
}

function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const normalized = tag.trim().toLowerCase();
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

// ============================================================================
// CATALOG
// ============================================================================

export class RuleCatalog {
  private readonly rules: ReadonlyMap<string, Rule>;
  private readonly positions: ReadonlyMap<string, number>;
  private readonly ordered: readonly Rule[];
  readonly version: string;
  readonly source: string | undefined;

  private constructor(rules: Rule[], version: string, source: string | undefined) {
    this.ordered = Object.freeze([...rules].sort((a, b) => compareIds(a.id, b.id)));
    this.rules = new Map(this.ordered.map((rule) => [rule.id, rule]));
    this.positions = new Map(this.ordered.map((rule, index) => [rule.id, index]));
    this.version = version;
    this.source = source;
  }

  /**
   * Validate every definition and build a catalog. Fails on the first invalid
   * definition or any duplicate id.
   */
  static load(definitions: readonly unknown[], options: RuleCatalogOptions = {}): RuleCatalog {
    const rules: Rule[] = [];
    const seen = new Set<string>();
    const duplicates = new Set<string>();

    definitions.forEach((definition, position) => {
      const parsed = RuleDefinitionSchema.safeParse(definition);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        const id = typeof definition === 'object' && definition !== null && 'id' in definition
          ? String(definition.id)
          : `#${position}`;
        throw new RuleCatalogError(`invalid rule ${id}: ${issues}`, [id], options.source);
      }
      const { id, title, category, description, tags, mandatory } = parsed.data;
      if (seen.has(id)) {
        duplicates.add(id);
        return;
      }
      seen.add(id);
      rules.push(Object.freeze({
        id,
        title,
        category,
        description: description.trim(),
        applicabilityTags: Object.freeze(normalizeTags(tags)),
        mandatory,
      }));
    });

    if (duplicates.size > 0) {
      const ids = [...duplicates].sort(compareIds);
      throw new RuleCatalogError(`duplicate rule ids: ${ids.join(', ')}`, ids, options.source);
    }

    return new RuleCatalog(rules, options.version ?? hashRules(rules), options.source);
  }

  get size(): number {
    return this.ordered.length;
  }

  get(id: string): Rule {
    const rule = this.rules.get(id);
    if (!rule) throw new NotFoundError('rule', id);
    return rule;
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  /** Every rule in catalog order. */
  all(): readonly Rule[] {
    return this.ordered;
  }

  /** Rules flagged mandatory in their definition, in catalog order. */
  mandatory(): Rule[] {
    return this.ordered.filter((rule) => rule.mandatory);
  }

  /** Catalog position of `id`; NotFoundError when absent. */
  position(id: string): number {
    const index = this.positions.get(id);
    if (index === undefined) throw new NotFoundError('rule', id);
    return index;
  }
}

function hashRules(rules: readonly Rule[]): string {
  const ordered = [...rules].sort((a, b) => compareIds(a.id, b.id));
  return createHash('sha256').update(JSON.stringify(ordered)).digest('hex').slice(0, 12);
}
