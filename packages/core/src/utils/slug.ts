/**
 * Sanitizes free text into a branch-name slug.
 * Lower-cases, collapses every run of non-alphanumerics into one hyphen and
 * trims hyphens at both ends, also after truncating to `maxLength`.
 */
export function slugify(text: string, maxLength: number = 50): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, maxLength)
    .replace(/-+$/, "");
}

/**
 * Branch base name for a change (e.g., 'add-bob-x-json').
 */
export function generateBranchBaseName(changeKind: string, path: string, maxLength: number = 30): string {
  return slugify(`${changeKind} ${path}`, maxLength);
}
