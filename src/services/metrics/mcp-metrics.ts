import { Counter, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * MCP tool metrics: invocations, duration and errors per tool.
 */

export const mcpToolCalls = new Counter({
  name: 'kbase_mcp_tool_calls_total',
  help: 'Total number of MCP tool invocations',
  labelNames: ['tool', 'status'],
  registers: [register]
});

export const mcpToolDuration = new Histogram({
  name: 'kbase_mcp_tool_duration_seconds',
  help: 'MCP tool execution duration in seconds',
  labelNames: ['tool', 'status'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register]
});

export const mcpToolErrors = new Counter({
  name: 'kbase_mcp_tool_errors_total',
  help: 'Total number of MCP tool execution errors',
  labelNames: ['tool'],
  registers: [register]
});
