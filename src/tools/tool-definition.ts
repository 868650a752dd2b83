import { z } from 'zod';

/**
 * JSON schema for a single tool parameter, as advertised to the model
 */
export interface JSONSchemaProperty {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description?: string;
  enum?: string[];
  default?: unknown;
  items?: JSONSchemaProperty;
}

/**
 * Top-level input schema of a tool. Always an object.
 */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required?: string[];
};

/**
 * Capability description sent to the remote model (handler excluded)
 */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

/**
 * Handler receiving the raw, loosely-typed arguments chosen by the model
 */
export type ToolHandler = (input: Record<string, unknown>) => Promise<string> | string;

/**
 * A tool ready to be registered
 */
export interface RegistrableTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  handler: ToolHandler;
}

/**
 * A tool with a typed input, parsed once before `run` sees it
 */
export interface TypedToolSpec<TInput> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  input: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  run(input: TInput): Promise<string>;
}

/**
 * Turns the first input validation issue into a tool result string
 */
export function formatInputError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'Error: Invalid input';
  }

  const field = issue.path.join('.');

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === 'undefined') {
        return `Error: ${field} parameter is required`;
      }
      return `Error: ${field} must be a ${issue.expected}`;
    case z.ZodIssueCode.invalid_enum_value:
      return `Error: ${field} must be one of: ${issue.options.join(', ')}`;
    default:
      return field ? `Error: ${field} - ${issue.message}` : `Error: ${issue.message}`;
  }
}

/**
 * Wraps a typed tool so the registry can call it with raw arguments
 */
export function defineTool<TInput>(tool: TypedToolSpec<TInput>): RegistrableTool {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    handler: async (raw) => {
      const parsed = tool.input.safeParse(raw);
      if (!parsed.success) {
        return formatInputError(parsed.error);
      }
      return tool.run(parsed.data);
    },
  };
}
