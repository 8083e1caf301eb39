/**
 * Round-robin palette rotation.
 *
 * The counter is module state shared by every chart model in the process: two
 * charts drawing series alternately consume one shared sequence of colors. This
 * matches how series colors have always been assigned; callers that need a
 * chart-local order must pass explicit colors instead.
 *
 * Reads and increments happen synchronously on the JS thread, so no two callers
 * can observe the same slot.
 */

let colorCount = 0;

export function getNextPaletteColor(colors: ReadonlyArray<string>): string {
  if (colors.length === 0) {
    throw new Error('paletteRotation: cannot pick a color from an empty palette.');
  }
  const color = colors[colorCount % colors.length];
  colorCount++;
  return color;
}

/**
 * Resets the shared rotation.
 *
 * @internal Test-only.
 */
export function _resetColorRotationForTesting(): void {
  colorCount = 0;
}
