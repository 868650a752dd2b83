/**
 * Tools command - List the tools the assistant can call
 */

import { Command } from 'commander';
import { applyOverrides, createLogger, createRegistry, loadConfig, type GlobalOptions } from '../bootstrap.js';
import { SandboxPolicy } from '../../security/sandbox-policy.js';
import type { ToolDefinition } from '../../tools/tool-definition.js';
import { formatError } from '../utils/output.js';

interface ToolsOptions {
  json?: boolean;
}

export function toolsCommand(): Command {
  const cmd = new Command('tools');

  cmd
    .description('List available tools')
    .option('--json', 'Print the tool definitions as JSON')
    .action(async (_options: ToolsOptions, command: Command) => {
      await runTools(command.optsWithGlobals<GlobalOptions & ToolsOptions>());
    });

  return cmd;
}

/**
 * Name, description and parameters of one tool, for terminal output
 */
export function describeTool(tool: ToolDefinition): string {
  const required = new Set(tool.input_schema.required ?? []);
  const params = Object.entries(tool.input_schema.properties).map(
    ([name, prop]) => `    - ${name} (${prop.type}${required.has(name) ? ', required' : ''})`,
  );
  return [`  ${tool.name}: ${tool.description}`, ...params].join('\n');
}

async function runTools(options: GlobalOptions & ToolsOptions): Promise<void> {
  try {
    const manager = await loadConfig(options.config);
    const config = applyOverrides(manager.config, options);
    const sandbox = new SandboxPolicy(config.sandbox.root);
    const registry = createRegistry(config, sandbox, createLogger(config));
    const definitions = registry.definitions();

    if (options.json) {
      console.log(JSON.stringify(definitions, null, 2));
      return;
    }

    console.log(`Sandbox: ${sandbox.root}\n`);
    console.log(`Tools (${definitions.length}):`);
    for (const tool of definitions) {
      console.log(describeTool(tool));
    }
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }
}
