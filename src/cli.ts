/**
 * CLI entry point for blast-arena
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout to the
 * xterm.js-compatible GameTerminal interface, so the arena runs directly in
 * any terminal emulator.
 */

import { type PlayArgs, parseCliArgs } from './args';
import { runArenaGame } from './games/arena';
import { type Disposable, type GameTerminal, type TerminalKeyEvent, setTheme } from './games/utils';
import { getThemeNames } from './themes';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

/**
 * Split a stdin chunk into single key presses. Two players mashing keys often
 * land in the same chunk.
 */
function splitKeys(data: string): string[] {
  const keys: string[] = [];
  const pattern = /\x1b\[[A-D]|\x1bO[A-D]|\r\n|[\s\S]/g;
  let match;
  while ((match = pattern.exec(data)) !== null) {
    keys.push(match[0]);
  }
  return keys;
}

function restoreTerminal() {
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }
  process.stdin.pause();
  process.stdout.write('\x1b[?1049l');
  process.stdout.write('\x1b[?25h');
  process.stdout.write('\x1b[0m');
}

function createNodeTerminal(): GameTerminal {
  const keyListeners: ((event: TerminalKeyEvent) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    for (const raw of splitKeys(data)) {
      if (raw === '\x03') {
        restoreTerminal();
        process.exit(0);
      }
      const key = parseKey(raw);
      for (const listener of [...keyListeners]) {
        listener({ key, domEvent: { key } });
      }
    }
  });

  // Synchronized output: wrap writes with DEC sync sequences so the
  // terminal batches clear + redraw into a single atomic paint.
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  const terminal: GameTerminal = {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    element: {}, // Truthy for isTerminalValid check
    onKey: (callback: (event: TerminalKeyEvent) => void): Disposable => {
      keyListeners.push(callback);
      return {
        dispose: () => {
          const idx = keyListeners.indexOf(callback);
          if (idx !== -1) keyListeners.splice(idx, 1);
        }
      };
    },
  };

  process.on('exit', restoreTerminal);
  process.on('SIGINT', () => { restoreTerminal(); process.exit(0); });
  process.on('SIGTERM', () => { restoreTerminal(); process.exit(0); });

  return terminal;
}

// ---------------------------------------------------------------------------
// Game lifecycle
// ---------------------------------------------------------------------------

function launch(settings: PlayArgs) {
  for (const warning of settings.warnings) {
    console.warn(`[BlastArena] ${warning}`);
  }
  setTheme(settings.theme);

  const terminal = createNodeTerminal();
  runArenaGame(terminal, {
    config: settings.config,
    videoStandard: settings.videoStandard,
    ...(settings.seed === undefined ? {} : { seed: settings.seed }),
    onQuit: () => {
      process.exit(0);
    },
    onError: (error) => {
      restoreTerminal();
      const detail = error instanceof Error ? error.stack ?? error.message : String(error);
      console.error(`[BlastArena] ${detail}`);
      process.exit(1);
    },
  });
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  blast-arena — Two-player bomb arena for the terminal

  Usage:
    blast-arena                  Start at the title screen
    blast-arena setup            Choose settings interactively, then play
    blast-arena --help           Show this help

  Options:
    --time <seconds>       Round length, 60-990 in steps of 10 (default 180)
    --drop-rate <percent>  Power-up chance for burnt walls, 0-100 (default 35)
    --bombs <n>            Bomb capacity reachable with power-ups, 1-9 (default 5)
    --range <n>            Blast range reachable with power-ups, 1-9 (default 9)
    --pal                  Run at 50 Hz instead of 60 Hz
    --theme <theme>        ${getThemeNames().join(', ')}
    --seed <n>             Seed of the first round's arena

  Controls:
    Player 1   WASD move, SPACE bomb, ESC start, TAB select, X reset
    Player 2   Arrows move, ENTER bomb, BACKSPACE start, \\ select, 0 reset
    Q          Quit from the title, options or winner screen

  Examples:
    blast-arena --time 120 --bombs 3
    blast-arena --theme amber --pal
`);
}

function main() {
  const parsed = parseCliArgs(process.argv.slice(2));

  switch (parsed.kind) {
    case 'help':
      printHelp();
      process.exit(0);
      break;
    case 'error':
      console.error(parsed.message);
      console.error('Run blast-arena --help for usage.');
      process.exit(1);
      break;
    case 'setup':
      import('./setup')
        .then(m => m.runSetup())
        .then(settings => {
          if (!settings) process.exit(0);
          else launch(settings);
        })
        .catch((error: unknown) => {
          console.error(`[Setup] ${error instanceof Error ? error.message : String(error)}`);
          process.exit(1);
        });
      break;
    case 'play':
      launch(parsed);
      break;
  }
}

main();
