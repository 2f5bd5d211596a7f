// Subset masks are enumerated as uint32, so at most 32 "other" x-values
export const MASK_BITS = 32;
export const MAX_POINTS = MASK_BITS;

// Report formatting defaults
export const COEFFICIENT_DIGITS = 8;
export const INTEGRAL_DIGITS = 8;
export const PLOT_X_DIGITS = 4;
export const PLOT_ESTIMATE_DIGITS = 8;
