import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { mcpToolCalls, mcpToolDuration, mcpToolErrors } from '../services/metrics/mcp-metrics.js';
import { KnowledgeBaseError, errorMessage } from '../types/index.js';
import { logger, type ToolOperation } from '../utils/logger.js';

export const MAX_RESULTS_RANGE = { min: 1, max: 20 } as const;
export const MIN_SIMILARITY_RANGE = { min: 0.1, max: 0.9 } as const;

export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(min, value), max);
}

export function clampMaxResults(value: number): number {
    return clamp(Math.trunc(value), MAX_RESULTS_RANGE.min, MAX_RESULTS_RANGE.max);
}

export function clampMinSimilarity(value: number): number {
    return clamp(value, MIN_SIMILARITY_RANGE.min, MIN_SIMILARITY_RANGE.max);
}

export interface ToolOutput {
    text: string;
    structured?: Record<string, unknown>;
}

/**
 * Runs one tool invocation: times and counts it, logs it, and turns any
 * failure into an `isError` result instead of a protocol error.
 */
export async function runTool(
    toolName: string,
    operation: ToolOperation,
    details: string,
    handler: () => Promise<ToolOutput>
): Promise<CallToolResult> {
    const timer = mcpToolDuration.startTimer({ tool: toolName });
    logger.tool(toolName, operation, details);
    try {
        const { text, structured } = await handler();
        mcpToolCalls.inc({ tool: toolName, status: 'success' });
        timer({ status: 'success' });
        const result: CallToolResult = { content: [{ type: 'text', text }] };
        if (structured) result.structuredContent = structured;
        return result;
    } catch (error) {
        mcpToolCalls.inc({ tool: toolName, status: 'error' });
        mcpToolErrors.inc({ tool: toolName });
        timer({ status: 'error' });
        if (error instanceof KnowledgeBaseError) {
            logger.warn(`[${toolName}] ${error.code}: ${error.message}`);
        } else {
            logger.error(`[${toolName}] failed`, error);
        }
        return {
            content: [{ type: 'text', text: `Error: ${errorMessage(error)}` }],
            isError: true
        };
    }
}
