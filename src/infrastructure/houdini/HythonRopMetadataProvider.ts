import { execFile } from 'child_process';
import { z } from 'zod';
import { RopMetadataError } from '../../core/errors/RenderErrors.js';
import type { IRopMetadataProvider, RopNodeInfo, RopSettings } from '../../core/interfaces/IRopMetadataProvider.js';
import { extractJson } from '../../utils/jsonOutput.js';
import { withRetry, type RetryConfig, type RetryLog } from '../../utils/retry.js';

/** Prefixes of the line pairs printed by scripts/inspect_rop.py */
export const NODE_MARKER = 'NODE:';
export const SETTINGS_MARKER = 'SETTINGS:';

export type CommandRunner = (command: string, args: readonly string[], timeoutMs: number) => Promise<string>;

const InspectSettingsSchema = z.object({
  f1: z.number().int(),
  f2: z.number().int(),
  f3: z.number().int().optional(),
  skip_rendered: z.union([z.boolean(), z.number()]).optional(),
  type: z.string().optional(),
});

type InspectSettings = z.infer<typeof InspectSettingsSchema>;

function toRopSettings(raw: InspectSettings): RopSettings {
  return {
    startFrame: raw.f1,
    endFrame: raw.f2,
    step: Math.max(1, raw.f3 ?? 1),
    skipRendered: Boolean(raw.skip_rendered),
  };
}

export function parseRopSettings(output: string): RopSettings {
  const result = extractJson(output, InspectSettingsSchema, SETTINGS_MARKER);
  if (!result.data) {
    throw RopMetadataError.fromInspectOutput(result.error ?? 'unreadable inspection output', output);
  }
  return toRopSettings(result.data);
}

/**
 * Every NODE: line followed by a readable SETTINGS: line, in output order
 */
export function parseRopList(output: string): RopNodeInfo[] {
  const nodes: RopNodeInfo[] = [];
  let currentPath: string | null = null;

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith(NODE_MARKER)) {
      currentPath = trimmed.slice(NODE_MARKER.length).trim() || null;
    } else if (trimmed.startsWith(SETTINGS_MARKER) && currentPath) {
      const { data } = extractJson(trimmed, InspectSettingsSchema, SETTINGS_MARKER);
      if (data) {
        nodes.push({ path: currentPath, nodeType: data.type ?? null, ...toRopSettings(data) });
      }
      currentPath = null;
    }
  }

  return nodes;
}

export const execFileRunner: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(command, [...args], { timeout: timeoutMs, maxBuffer: 8 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error) {
        const detail = stderr.trim().split('\n').slice(-3).join(' | ');
        reject(new Error(`${command} exited with an error: ${error.message}${detail ? ` (${detail})` : ''}`));
        return;
      }
      resolve(stdout);
    });
  });

/**
 * Reads ROP settings by running scripts/inspect_rop.py in hython
 */
export class HythonRopMetadataProvider implements IRopMetadataProvider {
  constructor(
    private readonly hythonPath: string,
    private readonly inspectScriptPath: string,
    private readonly retryConfig: RetryConfig,
    private readonly runCommand: CommandRunner = execFileRunner,
    private readonly debugLog: (message: string) => void = () => {}
  ) {}

  async getRopSettings(hipPath: string, outNode: string): Promise<RopSettings> {
    return this.inspect([hipPath, outNode], parseRopSettings);
  }

  /**
   * Render nodes under /out with their frame range and skip setting
   */
  async listRops(hipPath: string): Promise<RopNodeInfo[]> {
    return this.inspect([hipPath], parseRopList);
  }

  private inspect<T>(args: readonly string[], parse: (output: string) => T): Promise<T> {
    const onLog = (log: RetryLog) => {
      if (!log.success) {
        this.debugLog(`[RopMetadata] Inspection attempt ${log.attempt} failed: ${log.error}`);
      }
    };

    return withRetry(
      async () => {
        const output = await this.runCommand(this.hythonPath, [this.inspectScriptPath, ...args], this.retryConfig.timeoutMs);
        return parse(output);
      },
      this.retryConfig,
      onLog
    );
  }
}
