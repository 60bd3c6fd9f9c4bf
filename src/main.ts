/*
 * wildodds: estimate hand category odds for decks with jokers.
 */

import { main } from 'cli/run.ts'

process.exitCode = main(process.argv.slice(2));
