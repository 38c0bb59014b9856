import { EventBus } from './EventBus';

export type LogClass = 'debug' | 'info' | 'warn' | 'error' | 'focus';

const CLASS_MAP: Record<LogClass, string> = {
  debug: 'ld',
  info:  'li',
  warn:  'lw',
  error: 'le',
  focus: 'lf',
};

export const Logger = {
  log(text: string, type: LogClass = 'info'): void {
    const line = `[${type.toUpperCase()}] ${text}`;
    if (type === 'error') {
      console.error(line);
    } else if (type === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
    EventBus.emit('logMessage', { text, cls: CLASS_MAP[type] });
  },
};
