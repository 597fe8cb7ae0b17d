import { spawnSync } from 'child_process';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export interface DurationProbe {
  /** Duration in seconds; 0 when the file is missing or unreadable. */
  duration(filePath: string): Promise<number>;
}

export class FfprobeDurationProbe implements DurationProbe {
  constructor(private readonly binary: string = env.FFPROBE_PATH) {}

  async duration(filePath: string): Promise<number> {
    const proc = spawnSync(
      this.binary,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
      { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] },
    );
    if (proc.error || proc.status !== 0) {
      logger.debug('FFprobe: duration unavailable', { filePath, stderr: proc.stderr?.trim() });
      return 0;
    }
    const seconds = parseFloat(proc.stdout.trim());
    return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
  }
}
