import { Logger } from '../logging/logger.js';
import { SandboxPolicy } from '../security/sandbox-policy.js';
import { errorMessage } from '../utils/errors.js';
import { createCoreTools } from './core-tools.js';
import type {
  RegistrableTool,
  ToolDefinition,
  ToolHandler,
  ToolInputSchema,
} from './tool-definition.js';

export interface ToolRegistryOptions {
  logger?: Logger;
  /** Register the built-in catalog on construction */
  autoLoad?: boolean;
  /** Sandbox for the built-in file tools; defaults to ./sandbox */
  sandbox?: SandboxPolicy;
  /** Subset of built-in names to load */
  enabled?: readonly string[];
  now?: () => Date;
}

interface RegisteredTool {
  definition: ToolDefinition;
  handler: ToolHandler;
}

/**
 * ToolRegistry - Name → capability lookup used by the conversation loop
 *
 * Registering a name twice replaces the earlier entry. `execute` never
 * throws: unknown names and handler failures come back as `Error` strings.
 */
export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();
  private logger: Logger;

  constructor(options: ToolRegistryOptions = {}) {
    this.logger = options.logger ?? new Logger({ level: 'silent' });

    if (options.autoLoad) {
      const sandbox = options.sandbox ?? new SandboxPolicy('sandbox');
      for (const tool of createCoreTools({ sandbox, now: options.now }, options.enabled)) {
        this.registerTool(tool);
      }
    }
  }

  register(name: string, description: string, handler: ToolHandler, inputSchema: ToolInputSchema): void {
    this.tools.set(name, {
      definition: { name, description, input_schema: inputSchema },
      handler,
    });
  }

  registerTool(tool: RegistrableTool): void {
    this.register(tool.name, tool.description, tool.handler, tool.inputSchema);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Registered names, in registration order
   */
  list(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Definitions to advertise to the remote model
   */
  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.definition);
  }

  async execute(name: string, input?: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      await this.logger.warn('Unknown tool requested', { operation: 'tool_execute', toolName: name });
      return `Error: Unknown tool '${name}'`;
    }

    let result: string;
    try {
      result = await tool.handler(input ?? {});
    } catch (error) {
      await this.logger.error('Tool handler threw', error, { operation: 'tool_execute', toolName: name });
      return `Error executing ${name}: ${errorMessage(error)}`;
    }

    await this.logger.debug('Tool executed', {
      operation: 'tool_execute',
      toolName: name,
      failed: result.startsWith('Error'),
    });
    return result;
  }
}
