// lib/toolRegistry.ts

import { z } from 'zod';
import { AppError, ErrorCode } from '../types/access';
import { createLogger, redactSensitive } from '../utils/loggers';
import { filterParameters } from './parameterFilter';

const logger = createLogger('ToolRegistry');

export interface ToolDescriptor {
  name: string;
  description: string;
  tags: string[];
  parameters: string[];
}

export interface RegisteredTool<C> extends ToolDescriptor {
  invoke(args: Record<string, unknown>, context: C): Promise<unknown>;
}

export interface ToolDefinition<C, S extends z.AnyZodObject, R> {
  name: string;
  description: string;
  tags?: string[];
  parameters: S;
  handler: (params: z.infer<S>, context: C) => Promise<R>;
}

export function defineTool<C, S extends z.AnyZodObject, R>(
  definition: ToolDefinition<C, S, R>,
): RegisteredTool<C> {
  const { name, description, parameters, handler } = definition;

  return {
    name,
    description,
    tags: definition.tags ?? [],
    parameters: Object.keys(parameters.shape),
    async invoke(args, context) {
      const parsed = parameters.safeParse(args);
      if (!parsed.success) {
        throw new AppError({
          code: ErrorCode.INVALID_INPUT,
          message: `Invalid arguments for ${name}`,
          details: { issues: parsed.error.flatten().fieldErrors },
          originalError: parsed.error,
        });
      }
      return handler(parsed.data, context);
    },
  };
}

export class ToolRegistry<C> {
  private readonly tools = new Map<string, RegisteredTool<C>>();

  constructor(tools: readonly RegisteredTool<C>[] = []) {
    tools.forEach((tool) => this.register(tool));
  }

  register(tool: RegisteredTool<C>): void {
    if (this.tools.has(tool.name)) {
      throw new AppError({
        code: ErrorCode.CONFIGURATION_ERROR,
        message: `Tool ${tool.name} is already registered`,
      });
    }
    this.tools.set(tool.name, tool);
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(
      ({ name, description, tags, parameters }) => ({
        name,
        description,
        tags,
        parameters,
      }),
    );
  }

  async dispatch(name: string, args: unknown, context: C): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new AppError({
        code: ErrorCode.TOOL_NOT_FOUND,
        message: `Unknown tool ${name}`,
        details: { tool: name },
      });
    }

    const filtered = filterParameters(args, tool.parameters);
    if (!filtered) {
      throw new AppError({
        code: ErrorCode.INVALID_INPUT,
        message: `Arguments for ${name} must be an object`,
      });
    }

    if (filtered.ignored.length > 0) {
      logger.warn(`Ignoring unexpected arguments for ${name}`, {
        ignored: filtered.ignored,
      });
    }
    logger.info(`Tool called: ${name}`, {
      arguments: redactSensitive(filtered.accepted),
    });

    return tool.invoke(filtered.accepted, context);
  }
}
