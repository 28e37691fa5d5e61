/**
 * @fileoverview Public exports for the Prompt module.
 * @module modules/prompt
 * @version 1.0.0
 */

export { TerminalPrompter } from './TerminalPrompter';
export { FzfMatcher } from './FzfMatcher';
export type {
    FzfMatcherConfig,
    LineReader,
    MatcherProcess,
    SpawnMatcher,
    TerminalPrompterConfig,
} from './interfaces';
