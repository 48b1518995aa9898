export const Category = {
  General: 'General',
  School: 'School',
  Work: 'Work',
  Personal: 'Personal',
} as const;

export type Category = (typeof Category)[keyof typeof Category];

/** Display order; the first entry is the default */
export const CATEGORIES: readonly Category[] = [
  Category.General,
  Category.School,
  Category.Work,
  Category.Personal,
];

export const DEFAULT_CATEGORY: Category = Category.General;

/** Case-insensitive lookup of a category label */
export function parseCategory(input: string): Category | null {
  const needle = input.trim().toLowerCase();
  return CATEGORIES.find(c => c.toLowerCase() === needle) ?? null;
}

/** Labels written by earlier versions of the task file */
export const LEGACY_CATEGORY_LABELS: Readonly<Record<string, Category>> = {
  umum: Category.General,
  kuliah: Category.School,
  kerja: Category.Work,
  pribadi: Category.Personal,
};
