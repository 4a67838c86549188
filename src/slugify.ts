/**
 * Slugs
 */

/** What a normalized slug looks like */
export const SLUG_PATTERN = /^[a-z0-9-]*$/;

/**
 * Lowercase, accents folded, every run of other characters collapsed to a
 * single hyphen, no leading or trailing hyphen.
 *
 *   slugify('Hello, World!')  // 'hello-world'
 *   slugify('Crème Brûlée')   // 'creme-brulee'
 */
export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function isNormalizedSlug(slug: string): boolean {
  return slug === slugify(slug);
}
