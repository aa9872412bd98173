// Tool Registry - Central registry for the tools offered to the model
// Tools are registered while wiring the app; a bad registration fails startup

import { z } from 'zod';
import { ToolConfigurationError } from '../../utils/errors.js';
import type { JsonSchemaProperty, ToolArguments, ToolDeclaration, ToolDefinition, ToolParameter } from './types.js';

const TOOL_NAME_PATTERN = /^[a-z][a-z0-9_]{0,63}$/;

export type ValidationResult =
  | { ok: true; args: ToolArguments }
  | { ok: false; error: string };

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();
  private schemas: Map<string, z.ZodType<ToolArguments>> = new Map();

  register(tool: ToolDefinition): void {
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new ToolConfigurationError(`Invalid tool name "${tool.name}"`);
    }
    if (this.tools.has(tool.name)) {
      throw new ToolConfigurationError(`Tool "${tool.name}" is already registered`);
    }

    const seen = new Set<string>();
    for (const param of tool.parameters) {
      if (seen.has(param.name)) {
        throw new ToolConfigurationError(`Tool "${tool.name}" declares parameter "${param.name}" twice`);
      }
      if (param.enum && (param.type !== 'string' || param.enum.length === 0)) {
        throw new ToolConfigurationError(`Tool "${tool.name}" parameter "${param.name}" has an invalid enum`);
      }
      seen.add(param.name);
    }

    this.tools.set(tool.name, tool);
    this.schemas.set(tool.name, this.buildSchema(tool.parameters));
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  declare(): ToolDeclaration[] {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: this.parametersToSchema(tool.parameters),
        required: tool.parameters.filter(p => p.required).map(p => p.name),
      },
    }));
  }

  toOpenAIFunctions(): Array<{ type: 'function'; function: ToolDeclaration }> {
    return this.declare().map(declaration => ({ type: 'function' as const, function: declaration }));
  }

  /**
   * Check arguments against the tool's declared parameters. Unknown keys are
   * dropped; a non-object (e.g. unparsable JSON passed through raw) is rejected.
   */
  validate(name: string, args: unknown): ValidationResult {
    const schema = this.schemas.get(name);
    if (!schema) {
      return { ok: false, error: `Unknown tool "${name}"` };
    }

    if (typeof args === 'string') {
      return { ok: false, error: `Arguments for ${name} are not a valid JSON object: ${args.slice(0, 200)}` };
    }

    const result = schema.safeParse(args ?? {});
    if (result.success) {
      return { ok: true, args: result.data };
    }

    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: `Invalid arguments for ${name}: ${issues}` };
  }

  private buildSchema(params: ToolParameter[]): z.ZodType<ToolArguments> {
    const shape: Record<string, z.ZodTypeAny> = {};

    for (const param of params) {
      let field: z.ZodTypeAny;
      if (param.type === 'number') {
        field = z.number();
      } else if (param.type === 'boolean') {
        field = z.boolean();
      } else if (param.enum) {
        const allowed = param.enum;
        field = z.string().refine(value => allowed.includes(value), {
          message: `Expected one of: ${allowed.join(', ')}`,
        });
      } else {
        field = param.required ? z.string().min(1) : z.string();
      }

      shape[param.name] = param.required ? field : field.optional();
    }

    return z.object(shape);
  }

  private parametersToSchema(params: ToolParameter[]): Record<string, JsonSchemaProperty> {
    const schema: Record<string, JsonSchemaProperty> = {};

    for (const param of params) {
      const paramSchema: JsonSchemaProperty = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
