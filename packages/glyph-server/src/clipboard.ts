import { spawnSync } from 'child_process';

export interface ClipboardSink {
  write(text: string): void;
}

export interface ClipboardCommand {
  command: string;
  args: string[];
  /** The tool leaves a child behind to serve the selection; its output is not captured. */
  forks?: boolean;
}

export class ClipboardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClipboardError';
  }
}

export function resolveClipboardCommand(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): ClipboardCommand {
  if (platform === 'darwin') return { command: 'pbcopy', args: [] };
  if (platform === 'win32') return { command: 'clip', args: [] };
  if (env.WAYLAND_DISPLAY) return { command: 'wl-copy', args: [], forks: true };
  return { command: 'xclip', args: ['-selection', 'clipboard'], forks: true };
}

/** Copies through the platform's clipboard utility, text on stdin. */
export class SystemClipboard implements ClipboardSink {
  constructor(private cmd: ClipboardCommand = resolveClipboardCommand()) {}

  write(text: string) {
    // a forked child holding our stdout/stderr pipes would keep spawnSync waiting
    const res = spawnSync(this.cmd.command, this.cmd.args, {
      input: text,
      encoding: 'utf8',
      windowsHide: true,
      stdio: this.cmd.forks ? ['pipe', 'ignore', 'ignore'] : 'pipe',
    });
    if (res.error) throw new ClipboardError(`${this.cmd.command} failed: ${res.error.message}`);
    if (res.status !== 0) {
      const detail = (res.stderr ?? '').trim();
      throw new ClipboardError(`${this.cmd.command} exited with ${res.status}${detail ? `: ${detail}` : ''}`);
    }
  }
}
