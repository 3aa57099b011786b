/**
 * Did-you-mean suggestions for mistyped subcommands
 *
 * @module cli/suggest
 */

/**
 * Edit distance between two strings
 */
export function levenshtein(a: string, b: string): number {
  const previous = Array.from({ length: a.length + 1 }, (_, j) => j);
  for (let i = 1; i <= b.length; i++) {
    let diagonal = previous[0] ?? 0;
    previous[0] = i;
    for (let j = 1; j <= a.length; j++) {
      const above = previous[j] ?? 0;
      const left = previous[j - 1] ?? 0;
      previous[j] =
        b.charAt(i - 1) === a.charAt(j - 1) ? diagonal : Math.min(diagonal + 1, left + 1, above + 1);
      diagonal = above;
    }
  }
  return previous[a.length] ?? 0;
}

/**
 * Command names within `maxDistance` edits of the input, closest first
 */
export function findSimilarCommands(input: string, commands: string[], maxDistance = 2): string[] {
  return commands
    .map((cmd) => ({ cmd, distance: levenshtein(input.toLowerCase(), cmd.toLowerCase()) }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .map(({ cmd }) => cmd);
}
