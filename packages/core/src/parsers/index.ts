export {
  parseDeadline, normalizeDeadline, formatDeadline, formatDate, addDays, daysUntil,
} from './date-parser.js';
export { parseSearchFilters, matchesText } from './search-filter-parser.js';
export type { SearchFilters, StatusFilter } from './search-filter-parser.js';
