export interface LabelChange {
  /** Labels after the edit, original order first. */
  labels: string[];
  added: string[];
  removed: string[];
  /** Whether the label set differs from the original one. */
  changed: boolean;
}

/**
 * Append the `add` labels that are missing, then drop every `remove` label
 * from the extended list. A label named in both ends up removed.
 */
export function computeLabelChange(
  current: readonly string[],
  add: readonly string[],
  remove: readonly string[]
): LabelChange {
  const extended = [...current];
  for (const label of add) {
    if (!extended.includes(label)) extended.push(label);
  }

  const dropped = new Set(remove);
  const labels = extended.filter((label) => !dropped.has(label));

  const before = new Set(current);
  const after = new Set(labels);
  const added = [...after].filter((label) => !before.has(label));
  const removed = [...before].filter((label) => !after.has(label));

  return {
    labels,
    added,
    removed,
    changed: added.length > 0 || removed.length > 0,
  };
}
