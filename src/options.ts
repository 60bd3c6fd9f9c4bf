/*
 * global options
 */

/*
 * maximum number of items (cards and jokers) drawn per hand
 */
export const max_cards: number = 12;

/*
 * upper bounds on the deck flags, so a deck always fits in memory
 */
export const max_decks: number = 1000;
export const max_jokers: number = 1000;

/*
 * seeds are 32-bit unsigned
 */
export const max_seed: number = 2 ** 32 - 1;

/*
 * shape of a standard sub-deck
 */
export const num_ranks: number = 13;
export const num_suits: number = 4;

/*
 * defaults for command-line flags
 */
export const default_cards: number = 7;
export const default_decks: number = 1;
export const default_jokers: number = 0;
export const default_hand_size = 5;

/*
 * samples drawn between convergence checks
 */
export const batch_size: number = 100_000;

/*
 * width of the binomial confidence interval, in standard deviations
 */
export const z_score: number = 3; // ~99.73%
