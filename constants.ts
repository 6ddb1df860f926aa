export const SEPARATOR_CHARS: readonly string[] = ['_', '-', '.'];

// A radix must be corroborated by this many distinct cells (capped at the cell count).
export const MIN_CORROBORATING_CELLS = 2;

export const REVIEW_MESSAGES = {
  notEnoughImages: 'Review mode needs at least 2 displayed images.',
  noCommonPattern: 'No common filename pattern found in the displayed images.',
  noActiveReview: 'Review mode is not active.',
};
