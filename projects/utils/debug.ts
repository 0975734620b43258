import fs from 'fs';

/**
 * Something that has a debug str
 */
export interface IHaveDebugStr {
  toDebugStr(): string;
}

export type LogLevel = 'log' | 'warn';

type Listener = (level: LogLevel, line: string) => void;

class Logger {
  static readonly instance = new Logger();
  private listeners: Set<Listener> = new Set();
  private debugFile: number | undefined = undefined;

  private constructor() {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  log(...args: unknown[]) {
    this.emit('log', args);
  }

  warn(...args: unknown[]) {
    this.emit('warn', args);
  }

  private emit(level: LogLevel, args: unknown[]) {
    const line = args.map((arg) => String(arg)).join(' ');
    for (const listener of this.listeners) {
      listener(level, line);
    }
    if (process.env.DEBUG) {
      if (level == 'warn') {
        console.warn(line);
      } else {
        console.log(line);
      }
    } else if (process.env.DEBUG_FILE) {
      if (this.debugFile === undefined) {
        this.debugFile = fs.openSync(process.env.DEBUG_FILE, 'w');
      }
      fs.writeSync(this.debugFile, `${level}: ${line}\n`);
    }
  }

  /**
   * Run the given function, collecting every line logged while it runs.
   */
  capture<R>(insideFunc: () => R, logs: string[]): R {
    const unsub = this.subscribe((level, line) =>
      logs.push(level == 'warn' ? `warn: ${line}` : line)
    );
    try {
      return insideFunc();
    } finally {
      unsub();
    }
  }
}
export const logger = Logger.instance;

let shouldUseColors = false;
export function useColors(enabled = true) {
  shouldUseColors = enabled;
}

const ColorCodes = {
  red: '\u001b[31m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  blue: '\u001b[34m',
  cyan: '\u001b[36m',
  reset: '\u001b[0m',
  bold: '\u001b[1m',
};
type ColorName = Exclude<keyof typeof ColorCodes, 'reset'>;
type ColorFuncs = {
  [Property in ColorName]: (s: string) => string;
};

function colorFunc(color: ColorName) {
  return (s: string): string =>
    shouldUseColors ? ColorCodes[color] + s + ColorCodes.reset : s;
}

const colors: ColorFuncs = {
  red: colorFunc('red'),
  green: colorFunc('green'),
  yellow: colorFunc('yellow'),
  blue: colorFunc('blue'),
  cyan: colorFunc('cyan'),
  bold: colorFunc('bold'),
};
export { colors };
