/**
 * User names carry an upper-case first letter (wiki account convention)
 */
export function normalizeUserName(name: string): string {
  const trimmed = name.trim();
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
}
