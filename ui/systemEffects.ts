import { spawn, spawnSync } from 'node:child_process';
import type { Logger } from '../core/logger.js';
import type { PanelEffects } from './HistoryPanel.js';

type Command = { cmd: string; args: string[] };

export function clipboardCommand(platform: NodeJS.Platform = process.platform): Command {
  if (platform === 'darwin') return { cmd: 'pbcopy', args: [] };
  if (platform === 'win32') return { cmd: 'clip', args: [] };
  return { cmd: 'xclip', args: ['-selection', 'clipboard'] };
}

export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): Command {
  if (platform === 'darwin') return { cmd: 'open', args: [url] };
  // `start` treats the first quoted argument as a window title
  if (platform === 'win32') return { cmd: 'cmd', args: ['/c', 'start', '""', url] };
  return { cmd: 'xdg-open', args: [url] };
}

/**
 * Default clipboard and browser effects backed by the platform's own tools.
 * Failures are logged; the panel keeps running either way.
 */
export function systemEffects(
  log: Logger,
  platform: NodeJS.Platform = process.platform
): Pick<PanelEffects, 'copy' | 'openInBrowser'> {
  return {
    copy(text) {
      const { cmd, args } = clipboardCommand(platform);
      try {
        const result = spawnSync(cmd, args, { input: text, stdio: ['pipe', 'ignore', 'ignore'], windowsHide: true });
        if (result.error) {
          log.warn('clipboard_copy_failed', { cmd, error: result.error.message });
        } else if (result.status !== 0) {
          log.warn('clipboard_copy_failed', { cmd, status: result.status });
        }
      } catch (err) {
        log.warn('clipboard_copy_failed', { cmd, error: String(err) });
      }
    },
    openInBrowser(url) {
      const { cmd, args } = browserCommand(url, platform);
      try {
        const child = spawn(cmd, args, { detached: true, stdio: 'ignore', windowsHide: true });
        child.on('error', (err) => log.warn('open_in_browser_failed', { cmd, url, error: err.message }));
        child.unref();
      } catch (err) {
        log.warn('open_in_browser_failed', { cmd, url, error: String(err) });
      }
    },
  };
}
