/**
 * Parses search strings with filter tokens into structured filters.
 * Tokens like `category:work status:urgent id:3` are extracted; remaining
 * text becomes the plain case-insensitive text filter.
 *
 * Negation: prefix the value with `!` (e.g. `status:!done`, `category:!work`).
 */

import type { Category } from '../types/category.js';
import { parseCategory } from '../types/category.js';

export type StatusFilter = 'done' | 'pending' | 'urgent' | 'open';

export interface SearchFilters {
  text: string;
  categories: Category[];
  status: StatusFilter | null;
  ids: number[];

  // Negation filters
  notCategories: Category[];
  notStatus: StatusFilter | null;
}

const STATUS_MAP: Record<string, StatusFilter> = {
  done: 'done',
  completed: 'done',
  pending: 'pending',
  urgent: 'urgent',
  open: 'open',
  todo: 'open',
};

// Matches prefix:value tokens; value can be quoted or unquoted
const TOKEN_RE = /\b(category|cat|status|id):("[^"]*"|[^\s]+)/gi;
const ID_RE = /^\d+$/;

export function parseSearchFilters(query: string): SearchFilters {
  const filters: SearchFilters = {
    text: '',
    categories: [],
    status: null,
    ids: [],
    notCategories: [],
    notStatus: null,
  };

  const remaining = query.replace(TOKEN_RE, (match: string, prefix: string, rawValue: string) => {
    const unquoted = rawValue.replace(/^"|"$/g, '');
    const negated = unquoted.startsWith('!');
    const value = (negated ? unquoted.slice(1) : unquoted).toLowerCase();

    switch (prefix.toLowerCase()) {
      case 'category':
      case 'cat': {
        const category = parseCategory(value);
        if (!category) return match; // Unknown category: keep as text
        (negated ? filters.notCategories : filters.categories).push(category);
        return '';
      }
      case 'status': {
        const status = STATUS_MAP[value];
        if (!status) return match;
        if (negated) filters.notStatus = status;
        else filters.status = status;
        return '';
      }
      case 'id':
        if (negated || !ID_RE.test(value)) return match;
        filters.ids.push(parseInt(value, 10));
        return '';
      default:
        return match;
    }
  });

  filters.text = remaining.replace(/\s+/g, ' ').trim();
  return filters;
}

/** True when the task text (title, description, category) contains `needle`, ignoring case */
export function matchesText(
  task: { title: string; description: string; category: string },
  needle: string,
): boolean {
  const q = needle.trim().toLowerCase();
  if (!q) return true;
  return task.title.toLowerCase().includes(q)
    || task.description.toLowerCase().includes(q)
    || task.category.toLowerCase().includes(q);
}
