/**
 * @fileoverview Tool registry
 *
 * Name-based dispatch to external integrations (flight, hotel, rail, map
 * search, ...). Lookup tries the exact name, then `<name>_tool`.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  createLogger,
  formatValidationMessage,
  ToolExecutionError,
  zodErrorToIssues,
  type JsonObject,
} from '@wayfarer/core';

// =============================================================================
// Types
// =============================================================================

export type ToolHandler = (args: JsonObject, signal: AbortSignal) => Promise<unknown> | unknown;

export interface ToolDefinition {
  name: string;
  description?: string;
  /** Validates arguments before the handler runs */
  parameters?: ZodType<JsonObject, ZodTypeDef, unknown>;
  execute: ToolHandler;
}

/**
 * What the task executor needs from a tool backend
 */
export interface ToolInvoker {
  executeToolByName(name: string, args: JsonObject, signal: AbortSignal): Promise<unknown>;
}

export const TOOL_NAME_SUFFIX = '_tool';

// =============================================================================
// ToolRegistry
// =============================================================================

export class ToolRegistry implements ToolInvoker {
  private readonly logger = createLogger('executor:tools');
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(tools: ToolDefinition[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn('Replacing registered tool', { toolName: tool.name });
    }
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  list(): Array<Pick<ToolDefinition, 'name' | 'description'>> {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  /**
   * Run a tool by name
   *
   * @throws ToolExecutionError for an unknown tool or invalid arguments
   */
  async executeToolByName(name: string, args: JsonObject, signal: AbortSignal): Promise<unknown> {
    const tool = this.resolve(name);
    if (!tool) {
      throw new ToolExecutionError(`Tool ${name} not found`, { toolName: name, reason: 'not_found' });
    }

    let input = args;
    if (tool.parameters) {
      const parsed = tool.parameters.safeParse(args);
      if (!parsed.success) {
        const message = formatValidationMessage(zodErrorToIssues(parsed.error));
        throw new ToolExecutionError(`Invalid parameters for ${tool.name}: ${message}`, {
          toolName: tool.name,
          reason: 'invalid_params',
        });
      }
      input = parsed.data;
    }

    this.logger.debug('Executing tool', { toolName: tool.name, argumentKeys: Object.keys(input) });
    return tool.execute(input, signal);
  }

  private resolve(name: string): ToolDefinition | undefined {
    return this.tools.get(name) ?? this.tools.get(`${name}${TOOL_NAME_SUFFIX}`);
  }
}
