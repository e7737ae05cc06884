import { z } from 'zod';
import type { CommandRegistry } from '../registry.js';
import { DispatchError } from '../errors.js';
import { logger } from '../logger.js';

export const TOOL_PREFIX = 'samtools_';
export const USAGE_TOOL = `${TOOL_PREFIX}usage`;

export const commandInputShape = {
  args: z.array(z.string()).default([]).describe('Arguments passed verbatim to the subcommand, in order'),
  raw: z.boolean().default(false).describe('Return stdout as text even when an output parser would apply'),
};

export const usageInputShape = {
  command: z.string().describe('Public command name, e.g. "view"'),
};

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface CommandTool {
  name: string;
  command: string;
  description: string;
}

/** One MCP tool per registered command, named `samtools_<command>`. */
export function listCommandTools(registry: CommandRegistry): CommandTool[] {
  return registry.names().map((command) => {
    const dispatcher = registry.require(command);
    const parsed = dispatcher.parsers.length > 0 ? ' Output is parsed into JSON unless raw is set.' : '';
    return {
      name: `${TOOL_PREFIX}${command}`,
      command,
      description: `Run "samtools ${dispatcher.identifier}" with the given arguments.${parsed}`,
    };
  });
}

export async function callCommandTool(
  registry: CommandRegistry,
  command: string,
  input: { args: string[]; raw: boolean },
): Promise<ToolResult> {
  return respond(command, async () => {
    const record = await registry.require(command).run(input.args, { raw: input.raw });
    if (Buffer.isBuffer(record.value)) {
      // Binary output (BAM, BCF) cannot travel as JSON text.
      return {
        status: 'success',
        command,
        result: record.value.toString('base64'),
        encoding: 'base64',
        stderr: record.stderrLines,
      };
    }
    return { status: 'success', command, result: record.value, stderr: record.stderrLines };
  });
}

export async function callUsageTool(registry: CommandRegistry, input: { command: string }): Promise<ToolResult> {
  return respond(input.command, async () => ({
    status: 'success',
    command: input.command,
    usage: await registry.require(input.command).usage(),
  }));
}

async function respond(command: string, body: () => Promise<Record<string, unknown>>): Promise<ToolResult> {
  try {
    const payload = await body();
    return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
  } catch (err) {
    if (!(err instanceof DispatchError)) throw err;
    logger.info({ command, code: err.code }, 'Tool call returned an error');
    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: JSON.stringify({ status: 'error', command, error_code: err.code, message: err.message, context: err.context }),
        },
      ],
    };
  }
}
