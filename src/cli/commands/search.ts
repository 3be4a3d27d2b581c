/**
 * kbase search command
 */

import { Command, Option } from 'commander';
import { createKnowledgeBaseFromEnv, initializeKnowledgeBase } from '../../runtime.js';
import type { KnowledgeBase } from '../../services/knowledge/index.js';
import type { ScoredDocument } from '../../types/index.js';
import { errorMessage } from '../../types/index.js';
import { LEXICAL_MIN_SCORE, SEARCH_DEFAULT_LIMIT, VECTOR_MIN_SCORE } from '../../config.js';
import { toResultRows, writeError, writeJson } from '../output.js';
import { parsePositiveInt, parseScore } from '../parse.js';

export type SearchCommandMode = 'smart' | 'fuzzy' | 'vector';

interface SearchCommandOptions {
    mode: SearchCommandMode;
    limit: number;
    minScore?: number;
}

export async function runSearch(kb: KnowledgeBase, query: string, options: SearchCommandOptions): Promise<ScoredDocument[]> {
    switch (options.mode) {
        case 'vector':
            return kb.vectorSearch.search(query, options.limit, options.minScore ?? VECTOR_MIN_SCORE);
        case 'fuzzy':
            return kb.smartSearch.fuzzySearch(query, options.limit, options.minScore ?? LEXICAL_MIN_SCORE);
        case 'smart':
            return kb.smartSearch.search(query, options.limit, options.minScore ?? LEXICAL_MIN_SCORE);
    }
}

export function searchCommand(program: Command): void {
    program
        .command('search')
        .description('Search the knowledge base and print key, title and score as JSON')
        .argument('<query...>', 'Search query (multiple words allowed)')
        .addOption(new Option('-m, --mode <mode>', 'Search mode').choices(['smart', 'fuzzy', 'vector']).default('smart'))
        .option('-l, --limit <n>', 'Maximum number of results', parsePositiveInt, SEARCH_DEFAULT_LIMIT)
        .option('--min-score <x>', 'Minimum score (0-1); defaults depend on the mode', parseScore)
        .action(async (query: string[], options: SearchCommandOptions) => {
            try {
                const kb = createKnowledgeBaseFromEnv();
                await initializeKnowledgeBase(kb);
                const results = await runSearch(kb, query.join(' '), options);
                writeJson(toResultRows(results));
            } catch (error) {
                writeError(errorMessage(error));
                process.exitCode = 1;
            }
        });
}
