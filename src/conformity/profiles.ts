/**
 * Label profiles: every combination of 1..profileSize labels, in the order
 * the labels were given
 */
export function generateProfiles(
  labels: readonly string[],
  profileSize: number,
): string[][] {
  const profiles: string[][] = [];
  for (let size = 1; size <= profileSize; size++) {
    profiles.push(...combinations(labels, size));
  }
  return profiles;
}

function combinations(items: readonly string[], size: number): string[][] {
  const result: string[][] = [];
  const current: string[] = [];

  const pick = (start: number): void => {
    if (current.length === size) {
      result.push([...current]);
      return;
    }
    for (let i = start; i <= items.length - (size - current.length); i++) {
      current.push(items[i]);
      pick(i + 1);
      current.pop();
    }
  };

  pick(0);
  return result;
}

/**
 * Result key of a profile
 */
export function profileKey(profile: readonly string[]): string {
  return profile.join("_");
}

/**
 * Result key of a damping factor
 */
export function alphaKey(alpha: number): string {
  return String(alpha);
}
