import type { CallToolResult, Tool, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import {
  ZodArray,
  ZodBoolean,
  ZodDefault,
  ZodEffects,
  ZodEnum,
  ZodLiteral,
  ZodNullable,
  ZodNumber,
  ZodObject,
  ZodOptional,
  ZodString,
  ZodUnion,
  type ZodTypeAny,
} from 'zod';
import type { InputSchema } from './securityMiddleware.js';

export type SecurityWrapperFactory = <T>(
  namespace: string,
  operation: string,
  schema: InputSchema<T>,
) => (principal: string) => (
  params: Record<string, unknown>,
) => (handler: (validated: T) => Promise<CallToolResult>) => Promise<CallToolResult>;

export interface ErrorHandlerContract {
  handleError(error: unknown, context: string): CallToolResult;
  createValidationError(message: string, details?: string): CallToolResult;
}

export interface ResponseFormatterContract {
  runWithMinifyOverride<T>(minifyOverride: boolean | undefined, fn: () => T): T;
}

export interface DefaultArgumentResolverContext {
  name: string;
  rawArguments: Record<string, unknown>;
}

/**
 * Supplies raw argument values for keys the caller left out. Explicit
 * arguments always win over resolved defaults.
 */
export type DefaultArgumentResolver = (
  context: DefaultArgumentResolverContext,
) => Record<string, unknown> | Promise<Record<string, unknown> | undefined> | undefined;

export interface ToolSecurityOptions {
  namespace?: string;
  operation?: string;
}

export interface ToolMetadataOptions {
  inputJsonSchema?: Record<string, unknown>;
  annotations?: ToolAnnotations;
}

export interface ToolExecutionContext {
  principal: string;
  name: string;
  operation: string;
  rawArguments: Record<string, unknown>;
}

export interface ToolExecutionPayload<TInput> {
  input: TInput;
  context: ToolExecutionContext;
}

export type ToolHandler<TInput> = (payload: ToolExecutionPayload<TInput>) => Promise<CallToolResult>;

export interface ToolDefinition<TInput> {
  name: string;
  description: string;
  inputSchema: InputSchema<TInput>;
  handler: ToolHandler<TInput>;
  security?: ToolSecurityOptions;
  metadata?: ToolMetadataOptions;
  defaultArgumentResolver?: DefaultArgumentResolver;
}

/**
 * A registered tool with its input type erased behind `invoke`
 */
interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: ZodTypeAny;
  security: Required<ToolSecurityOptions>;
  metadata?: ToolMetadataOptions | undefined;
  defaultArgumentResolver?: DefaultArgumentResolver | undefined;
  invoke(principal: string, rawArguments: Record<string, unknown>): Promise<CallToolResult>;
}

export interface ToolExecutionOptions {
  name: string;
  principal: string;
  arguments?: Record<string, unknown>;
  minifyOverride?: boolean;
}

export interface ToolRegistryDependencies {
  withSecurityWrapper: SecurityWrapperFactory;
  errorHandler: ErrorHandlerContract;
  responseFormatter: ResponseFormatterContract;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a generated JSON schema to the object shape MCP tool listings carry
 */
function toToolInputSchema(json: Record<string, unknown>): Tool['inputSchema'] {
  const properties = json['properties'];
  const required = json['required'];
  return {
    type: 'object',
    ...(isRecord(properties) ? { properties } : {}),
    ...(Array.isArray(required)
      ? { required: required.filter((key): key is string => typeof key === 'string') }
      : {}),
    ...(json['additionalProperties'] === false ? { additionalProperties: false } : {}),
  };
}

export const MINIFY_HINT_KEYS = ['minify', '_minify', '__minify'] as const;

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(private readonly deps: ToolRegistryDependencies) {}

  register<TInput>(definition: ToolDefinition<TInput>): void {
    this.assertValidDefinition(definition);

    if (this.tools.has(definition.name)) {
      throw new Error(`Tool '${definition.name}' is already registered`);
    }

    const security: Required<ToolSecurityOptions> = {
      namespace: definition.security?.namespace ?? 'reporting',
      operation: definition.security?.operation ?? definition.name,
    };
    const executionContext = `executing ${definition.name} - ${security.operation}`;

    this.tools.set(definition.name, {
      name: definition.name,
      description: definition.description,
      inputSchema: definition.inputSchema,
      security,
      metadata: definition.metadata,
      defaultArgumentResolver: definition.defaultArgumentResolver,
      invoke: (principal, rawArguments) =>
        this.deps.withSecurityWrapper(
          security.namespace,
          security.operation,
          definition.inputSchema,
        )(principal)(rawArguments)(async (validated) => {
          try {
            return await definition.handler({
              input: validated,
              context: {
                principal,
                name: definition.name,
                operation: security.operation,
                rawArguments,
              },
            });
          } catch (handlerError) {
            return this.deps.errorHandler.handleError(handlerError, executionContext);
          }
        }),
    });
  }

  listTools(): Tool[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toToolInputSchema(
        tool.metadata?.inputJsonSchema ?? this.generateJsonSchema(tool.inputSchema),
      ),
      ...(tool.metadata?.annotations ? { annotations: tool.metadata.annotations } : {}),
    }));
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  async executeTool(options: ToolExecutionOptions): Promise<CallToolResult> {
    const tool = this.tools.get(options.name);
    if (!tool) {
      return this.deps.errorHandler.createValidationError(
        `Unknown tool: ${options.name}`,
        'The requested tool is not registered with the server',
      );
    }

    const providedArguments: Record<string, unknown> = { ...(options.arguments ?? {}) };
    const minifyOverride = this.extractMinifyOverride(options, providedArguments);
    for (const key of MINIFY_HINT_KEYS) {
      delete providedArguments[key];
    }

    let defaults: Record<string, unknown> | undefined;
    try {
      defaults = tool.defaultArgumentResolver
        ? await tool.defaultArgumentResolver({
            name: tool.name,
            rawArguments: providedArguments,
          })
        : undefined;
    } catch (resolutionError) {
      return this.deps.errorHandler.handleError(
        resolutionError,
        `resolving default arguments for ${tool.name}`,
      );
    }

    const rawArguments: Record<string, unknown> = {
      ...(defaults ?? {}),
      ...providedArguments,
    };

    const run = async (): Promise<CallToolResult> => {
      try {
        return await tool.invoke(options.principal, rawArguments);
      } catch (securityError) {
        return this.deps.errorHandler.handleError(securityError, `executing ${tool.name}`);
      }
    };

    try {
      return await this.deps.responseFormatter.runWithMinifyOverride(minifyOverride, run);
    } catch (formatterError) {
      return this.deps.errorHandler.handleError(
        formatterError,
        `formatting response for ${tool.name}`,
      );
    }
  }

  private extractMinifyOverride(
    options: ToolExecutionOptions,
    args: Record<string, unknown>,
  ): boolean | undefined {
    if (typeof options.minifyOverride === 'boolean') {
      return options.minifyOverride;
    }

    for (const key of MINIFY_HINT_KEYS) {
      const value = args[key];
      if (typeof value === 'boolean') {
        return value;
      }
    }

    return undefined;
  }

  private assertValidDefinition<TInput>(definition: ToolDefinition<TInput>): void {
    if (!definition.name || typeof definition.name !== 'string') {
      throw new Error('Tool definition requires a non-empty name');
    }

    if (!definition.description || typeof definition.description !== 'string') {
      throw new Error(`Tool '${definition.name}' requires a description`);
    }

    if (typeof definition.inputSchema?.safeParse !== 'function') {
      throw new Error(`Tool '${definition.name}' requires a valid Zod schema`);
    }

    if (typeof definition.handler !== 'function') {
      throw new Error(`Tool '${definition.name}' requires a handler function`);
    }

    if (
      definition.defaultArgumentResolver !== undefined &&
      typeof definition.defaultArgumentResolver !== 'function'
    ) {
      throw new Error(
        `Tool '${definition.name}' defaultArgumentResolver must be a function when provided`,
      );
    }
  }

  private generateJsonSchema(schema: ZodTypeAny): Record<string, unknown> {
    try {
      return this.convertZodTypeToJsonSchema(schema);
    } catch {
      return { type: 'object', additionalProperties: true };
    }
  }

  private convertZodTypeToJsonSchema(type: ZodTypeAny): Record<string, unknown> {
    if (type instanceof ZodObject) {
      const shape: Record<string, ZodTypeAny> = type.shape;
      const properties: Record<string, unknown> = {};
      const required: string[] = [];

      for (const [key, value] of Object.entries(shape)) {
        const { schema: propertySchema, optional } = this.unwrapOptional(value);
        properties[key] = this.convertZodTypeToJsonSchema(propertySchema);
        if (!optional) {
          required.push(key);
        }
      }

      const base: Record<string, unknown> = {
        type: 'object',
        properties,
      };

      if (required.length > 0) {
        base['required'] = required;
      }

      base['additionalProperties'] = false;
      return base;
    }

    if (type instanceof ZodArray) {
      return {
        type: 'array',
        items: this.convertZodTypeToJsonSchema(type.element),
      };
    }

    if (type instanceof ZodString) {
      return { type: 'string', ...(type.description ? { description: type.description } : {}) };
    }

    if (type instanceof ZodNumber) {
      return { type: type.isInt ? 'integer' : 'number' };
    }

    if (type instanceof ZodBoolean) {
      return { type: 'boolean' };
    }

    if (type instanceof ZodEnum) {
      const values: string[] = type.options;
      return {
        type: 'string',
        enum: [...values],
      };
    }

    if (type instanceof ZodLiteral) {
      const literal: unknown = type.value;
      return {
        const: literal,
        type: typeof literal,
      };
    }

    if (type instanceof ZodUnion) {
      const options: readonly ZodTypeAny[] = type.options;
      return {
        anyOf: options.map((option) => this.convertZodTypeToJsonSchema(option)),
      };
    }

    if (type instanceof ZodEffects) {
      return this.convertZodTypeToJsonSchema(type.innerType());
    }

    if (type instanceof ZodDefault) {
      return this.convertZodTypeToJsonSchema(type.removeDefault());
    }

    if (type instanceof ZodNullable) {
      return {
        anyOf: [this.convertZodTypeToJsonSchema(type.unwrap()), { type: 'null' }],
      };
    }

    if (type instanceof ZodOptional) {
      return this.convertZodTypeToJsonSchema(type.unwrap());
    }

    return { type: 'object', additionalProperties: true };
  }

  private unwrapOptional(value: ZodTypeAny): { schema: ZodTypeAny; optional: boolean } {
    if (value instanceof ZodOptional) {
      const inner = this.unwrapOptional(value.unwrap());
      return { schema: inner.schema, optional: true };
    }

    if (value instanceof ZodDefault) {
      const inner = this.unwrapOptional(value.removeDefault());
      return { schema: inner.schema, optional: true };
    }

    return { schema: value, optional: false };
  }
}
