/**
 * Stage tracking for multi-stage reminder schedules.
 *
 * The position of today's offset in a definition's offset list is the stage
 * index. Every successful send appends one `sent` row, so a recipient with
 * more `sent` rows than the stage index has already been handled for this
 * stage (or a later one).
 */

/**
 * Position of `daysUntilDeadline` in `offsets`, or -1 when it is not a stage day.
 */
export function stageIndexOf(offsets: readonly number[], daysUntilDeadline: number): number {
  return offsets.indexOf(daysUntilDeadline);
}

/**
 * Callers must only pass a `daysUntilDeadline` contained in `offsets`.
 */
export function isStageAlreadySatisfied(
  offsets: readonly number[],
  daysUntilDeadline: number,
  priorSentCount: number
): boolean {
  const stageIndex = stageIndexOf(offsets, daysUntilDeadline);
  if (stageIndex === -1) {
    throw new RangeError(
      `days until deadline ${daysUntilDeadline} is not one of the offsets [${offsets.join(', ')}]`
    );
  }
  // Counts sends, not stages: a definition first seen after earlier stages
  // passed sends again on every run until its count exceeds the stage index.
  return priorSentCount > stageIndex;
}
