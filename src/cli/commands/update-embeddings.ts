/**
 * kbase update-embeddings command
 */

import { Command } from 'commander';
import { createKnowledgeBaseFromEnv, initializeKnowledgeBase } from '../../runtime.js';
import { errorMessage } from '../../types/index.js';
import { writeError, writeJson } from '../output.js';

interface UpdateEmbeddingsOptions {
    dryRun?: boolean;
}

export function updateEmbeddingsCommand(program: Command): void {
    program
        .command('update-embeddings')
        .description('Regenerate document embeddings (all documents, or one by key)')
        .argument('[key]', 'Document key; all documents when omitted')
        .option('--dry-run', 'Report embedding coverage without changing anything')
        .action(async (key: string | undefined, options: UpdateEmbeddingsOptions) => {
            try {
                const kb = createKnowledgeBaseFromEnv();
                await initializeKnowledgeBase(kb);
                if (options.dryRun) {
                    const coverage = await kb.vectorSearch.countEmbeddingCoverage();
                    writeJson({ dryRun: true, ...coverage, missing: coverage.total - coverage.withEmbedding });
                    return;
                }
                const updated = await kb.vectorSearch.updateDocumentEmbeddings(key);
                writeJson({ updated, ...(key ? { key } : {}) });
                if (key && updated === 0) process.exitCode = 1;
            } catch (error) {
                writeError(errorMessage(error));
                process.exitCode = 1;
            }
        });
}
