/**
 * UI Type Definitions
 * Shared by the terminal output helpers in utils/ui.
 */

/** Semantic colors mapped to the palette in utils/ui */
export type SemanticColor =
  | 'success'
  | 'error'
  | 'warning'
  | 'info'
  | 'dim'
  | 'primary'
  | 'secondary'
  | 'command'
  | 'path';

export type BorderStyle = 'single' | 'double' | 'round' | 'bold' | 'classic';

export interface BoxOptions {
  title?: string;
  padding?: number;
  margin?: number;
  borderStyle?: BorderStyle;
  borderColor?: string;
  titleAlignment?: 'left' | 'center' | 'right';
}

export interface SpinnerOptions {
  text: string;
  prefixText?: string;
}

/** Handle returned by spinner(), identical in TTY and plain mode */
export interface SpinnerController {
  succeed(message?: string): void;
  fail(message?: string): void;
  warn(message?: string): void;
  info(message?: string): void;
  update(text: string): void;
  stop(): void;
}
