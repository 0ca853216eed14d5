import readline from 'node:readline';
import { isJsonObject } from '../utils/json.js';
import type { EconopsClient } from '../clients/econops.js';
import type { CacheStats } from '../cache/cache.js';
import type { ApiResponse, HttpMethod, JsonObject } from '../types/index.js';

export interface TextSink {
  write(text: string): unknown;
}

export const PROMPT = 'econops> ';

export function parsePayload(text: string | undefined): JsonObject | undefined {
  if (text === undefined || text.trim() === '') {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new Error(`Invalid JSON data: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isJsonObject(parsed)) {
    throw new Error('Invalid JSON data: payload must be a JSON object');
  }
  return parsed;
}

export function formatResponse(response: ApiResponse): string {
  if (response.status === 200) {
    return response.data === undefined ? `${response.body}\n` : `${JSON.stringify(response.data, null, 2)}\n`;
  }
  return `Error: ${response.status}\n${response.body}\n`;
}

export function formatCacheInfo(stats: CacheStats): string {
  return [
    `Cache directory: ${stats.directory}`,
    `Cached requests: ${stats.count}`,
    `Cache size (bytes): ${stats.totalBytes}`,
  ].join('\n') + '\n';
}

export async function runCall(
  client: EconopsClient,
  route: string,
  payloadText: string | undefined,
  output: TextSink,
  method?: HttpMethod,
): Promise<ApiResponse> {
  const payload = parsePayload(payloadText);
  const response = await client.request(route, payload, method ? { method } : {});
  output.write(formatResponse(response));
  return response;
}

export function splitCommandLine(line: string): { route: string; payloadText: string | undefined } {
  const spaceIndex = line.indexOf(' ');
  if (spaceIndex === -1) {
    return { route: line, payloadText: undefined };
  }
  return { route: line.slice(0, spaceIndex), payloadText: line.slice(spaceIndex + 1) };
}

export interface InteractiveIo {
  input: NodeJS.ReadableStream;
  output: TextSink;
}

/** Reads `route [json]` lines until `quit` or `exit`; errors are reported and the loop goes on. */
export async function runInteractive(client: EconopsClient, io: InteractiveIo): Promise<void> {
  io.output.write("EconOps API Interactive CLI\nType 'quit' to exit\n\n");
  io.output.write(PROMPT);

  const rl = readline.createInterface({ input: io.input, terminal: false });
  try {
    for await (const rawLine of rl) {
      const line = rawLine.trim();
      if (line === 'quit' || line === 'exit') {
        break;
      }

      if (line !== '') {
        await handleLine(client, line, io.output);
        io.output.write('\n');
      }
      io.output.write(PROMPT);
    }
  } finally {
    rl.close();
  }

  io.output.write('Goodbye!\n');
}

async function handleLine(client: EconopsClient, line: string, output: TextSink): Promise<void> {
  const { route, payloadText } = splitCommandLine(line);
  try {
    await runCall(client, route, payloadText, output);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    output.write(message.startsWith('Invalid JSON data') ? `${message}\n` : `Error: ${message}\n`);
  }
}
