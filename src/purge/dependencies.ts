/**
 * Dependency rules: which extra pages go stale when an entity type changes.
 */

/** A static path, or a function deriving path(s) from the changed instance. */
export type UrlTemplate = string | { paths(instance: unknown): string | readonly string[] };

export type DependencyRules = ReadonlyMap<string, readonly UrlTemplate[]>;

/**
 * Build the immutable rule table from configured static paths plus any
 * programmatic templates. Templates for the same type are appended in order.
 */
export function createDependencyRules(
  staticPaths: Record<string, readonly string[]>,
  templates: Record<string, readonly UrlTemplate[]> = {},
): DependencyRules {
  const rules = new Map<string, readonly UrlTemplate[]>();
  for (const [entityType, paths] of Object.entries(staticPaths)) {
    rules.set(entityType, Object.freeze([...paths]));
  }
  for (const [entityType, extra] of Object.entries(templates)) {
    rules.set(entityType, Object.freeze([...(rules.get(entityType) ?? []), ...extra]));
  }
  return rules;
}

/**
 * Expand the templates registered for a type into concrete paths.
 */
export function expandDependencies(rules: DependencyRules, entityType: string, instance: unknown): string[] {
  const templates = rules.get(entityType) ?? [];
  return templates.flatMap((template) => {
    if (typeof template === 'string') return [template];
    const produced = template.paths(instance);
    return typeof produced === 'string' ? [produced] : [...produced];
  });
}
