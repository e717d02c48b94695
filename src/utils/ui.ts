/**
 * Central UI Abstraction Layer
 *
 * Provides semantic, TTY-aware styling for CLI output.
 * Wraps chalk, boxen, gradient-string and ora with a consistent API.
 *
 * Constraints:
 * - NO EMOJIS (ASCII only: [OK], [X], [!], [i])
 * - TTY-aware (plain text in pipes/CI)
 * - Respects NO_COLOR environment variable
 *
 * @module utils/ui
 */

import type {
  BoxOptions,
  SpinnerOptions,
  SemanticColor,
  SpinnerController,
} from '../types/utils';

// =============================================================================
// LAZY LOADED MODULES
// =============================================================================

type ChalkInstance = typeof import('chalk');
type BoxenFunction = typeof import('boxen');
type GradientFunction = typeof import('gradient-string');
type OraFunction = typeof import('ora');

let chalkModule: ChalkInstance | null = null;
let boxenModule: BoxenFunction | null = null;
let gradientModule: GradientFunction | null = null;
let oraModule: OraFunction | null = null;

let initialized = false;

// =============================================================================
// COLOR PALETTE
// =============================================================================

const COLORS = {
  primary: '#85EA2D', // Swagger green
  secondary: '#49CC90',
} as const;

// =============================================================================
// INITIALIZATION
// =============================================================================

/**
 * Initialize UI dependencies (call once at startup)
 */
export async function initUI(): Promise<void> {
  if (initialized) return;

  try {
    const [chalkImport, boxenImport, gradientImport, oraImport] = await Promise.all([
      import('chalk'),
      import('boxen'),
      import('gradient-string'),
      import('ora'),
    ]);

    chalkModule = chalkImport.default;
    boxenModule = boxenImport.default;
    gradientModule = gradientImport.default;
    oraModule = oraImport.default;
  } catch {
    // UI works without colors if imports fail
    console.error('[!] UI initialization failed, using plain text mode');
  }
  initialized = true;
}

// =============================================================================
// TTY & COLOR DETECTION
// =============================================================================

/**
 * Check if colors should be used
 * Respects NO_COLOR and FORCE_COLOR environment variables
 */
function useColors(): boolean {
  if (process.env.FORCE_COLOR) return true;
  if (process.env.NO_COLOR) return false;
  return !!process.stdout.isTTY;
}

/**
 * Check if interactive mode (TTY + not CI)
 */
export function isInteractive(): boolean {
  return !!process.stdout.isTTY && !process.env.CI && !process.env.NO_COLOR;
}

// =============================================================================
// COLOR SYSTEM
// =============================================================================

/**
 * Apply semantic color to text
 */
export function color(text: string, semantic: SemanticColor): string {
  if (!chalkModule || !useColors()) return text;

  switch (semantic) {
    case 'success':
      return chalkModule.green.bold(text);
    case 'error':
      return chalkModule.red.bold(text);
    case 'warning':
      return chalkModule.yellow(text);
    case 'info':
      return chalkModule.cyan(text);
    case 'dim':
      return chalkModule.gray(text);
    case 'primary':
      return chalkModule.hex(COLORS.primary).bold(text);
    case 'secondary':
      return chalkModule.hex(COLORS.secondary)(text);
    case 'command':
      return chalkModule.yellow.bold(text);
    case 'path':
      return chalkModule.cyan.underline(text);
    default:
      return text;
  }
}

/**
 * Apply the primary-to-secondary gradient (headers only)
 */
export function gradientText(text: string): string {
  if (!gradientModule || !useColors()) return text;
  return gradientModule([COLORS.primary, COLORS.secondary])(text);
}

export function bold(text: string): string {
  if (!chalkModule || !useColors()) return text;
  return chalkModule.bold(text);
}

export function dim(text: string): string {
  if (!chalkModule || !useColors()) return text;
  return chalkModule.dim(text);
}

// =============================================================================
// STATUS INDICATORS (ASCII only - NO EMOJIS)
// =============================================================================

/** Success indicator: [OK] */
export function ok(message: string): string {
  return `${color('[OK]', 'success')} ${message}`;
}

/** Error indicator: [X] */
export function fail(message: string): string {
  return `${color('[X]', 'error')} ${message}`;
}

/** Warning indicator: [!] */
export function warn(message: string): string {
  return `${color('[!]', 'warning')} ${message}`;
}

/** Info indicator: [i] */
export function info(message: string): string {
  return `${color('[i]', 'info')} ${message}`;
}

// =============================================================================
// BOX RENDERING
// =============================================================================

/**
 * Fallback ASCII box renderer (when boxen not available)
 */
function renderAsciiBox(content: string, options: BoxOptions): string {
  const lines = content.split('\n');
  const title = options.title ?? '';
  const maxLen = Math.max(...lines.map((l) => l.length), title.length + 4);
  const width = maxLen + 4;
  const padding = options.padding ?? 1;
  const blank = '|' + ' '.repeat(width - 2) + '|';

  const out: string[] = [];
  if (title) {
    const titlePad = Math.floor((width - title.length - 4) / 2);
    out.push(
      '+' + '-'.repeat(titlePad) + ' ' + title + ' ' + '-'.repeat(width - titlePad - title.length - 4) + '+'
    );
  } else {
    out.push('+' + '-'.repeat(width - 2) + '+');
  }
  for (let i = 0; i < padding; i++) out.push(blank);
  for (const line of lines) {
    out.push('| ' + line + ' '.repeat(Math.max(0, width - line.length - 4)) + ' |');
  }
  for (let i = 0; i < padding; i++) out.push(blank);
  out.push('+' + '-'.repeat(width - 2) + '+');

  return out.join('\n');
}

/**
 * Render content in a styled box
 */
export function box(content: string, options: BoxOptions = {}): string {
  if (!boxenModule) {
    return renderAsciiBox(content, options);
  }

  const borderColor = useColors() ? options.borderColor || COLORS.primary : undefined;

  return boxenModule(content, {
    padding: options.padding ?? 1,
    margin: options.margin ?? 0,
    borderStyle: options.borderStyle || 'round',
    borderColor,
    title: options.title,
    titleAlignment: options.titleAlignment || 'center',
  });
}

/**
 * Render error box (red border)
 */
export function errorBox(content: string, title = 'ERROR'): string {
  return box(content, { title, borderColor: 'red', padding: 1, margin: 1 });
}


// =============================================================================
// SPINNER / PROGRESS
// =============================================================================

/**
 * Create and start a spinner
 * Falls back to plain text output in non-TTY environments
 */
export async function spinner(options: SpinnerOptions | string): Promise<SpinnerController> {
  const opts = typeof options === 'string' ? { text: options } : options;
  const isEnabled = isInteractive();

  if (!oraModule && isEnabled) {
    try {
      oraModule = (await import('ora')).default;
    } catch {
      // Fallback to plain text
    }
  }

  if (oraModule && isEnabled) {
    const s = oraModule({
      text: opts.text,
      color: 'green',
      prefixText: opts.prefixText,
      isEnabled,
    }).start();

    return {
      succeed: (msg?: string) => s.succeed(msg || opts.text),
      fail: (msg?: string) => s.fail(msg || opts.text),
      warn: (msg?: string) => s.warn(msg || opts.text),
      info: (msg?: string) => s.info(msg || opts.text),
      update: (text: string) => {
        s.text = text;
      },
      stop: () => s.stop(),
    };
  }

  // Fallback: plain text (non-TTY)
  console.log(info(`${opts.text}...`));
  return {
    succeed: (msg?: string) => console.log(ok(msg || opts.text)),
    fail: (msg?: string) => console.log(fail(msg || opts.text)),
    warn: (msg?: string) => console.log(warn(msg || opts.text)),
    info: (msg?: string) => console.log(info(msg || opts.text)),
    update: () => {
      /* no-op in non-TTY */
    },
    stop: () => {
      /* no-op */
    },
  };
}

// =============================================================================
// SECTION HEADERS
// =============================================================================

export function header(text: string, useGradient = true): string {
  if (useGradient && useColors()) {
    return gradientText(text);
  }
  return bold(text);
}

export function subheader(text: string): string {
  return color(text, 'primary');
}
