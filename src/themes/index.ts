/**
 * Terminal color themes
 *
 * Each theme is a set of ANSI escape codes used by the board renderer.
 * 256-color codes are used throughout so themes look the same over SSH
 * on any reasonably modern terminal.
 */

/**
 * Available theme identifiers
 */
export type PhosphorMode =
  | 'violet'
  | 'cyan'
  | 'amber'
  | 'green'
  | 'hotpink'
  | 'ice'
  | 'mono';

/**
 * Styles used when drawing a frame
 */
export interface Palette {
  /** Cursor cell: bold on a colored background */
  highlight: string;
  /** Cells inside the current selection */
  marked: string;
  /** Rules text and help descriptions */
  dim: string;
  /** Key names in the help view */
  helpKey: string;
  /** Title line */
  title: string;
}

export interface ThemeColors {
  /** Display name */
  name: string;
  palette: Palette;
}

const BOLD = '\x1b[1m';
const DIM_GRAY = '\x1b[38;5;241m';
const HELP_GRAY = '\x1b[38;5;246m';

/**
 * All theme definitions
 */
export const themes: Record<PhosphorMode, ThemeColors> = {
  violet: {
    name: 'Violet',
    palette: {
      highlight: `${BOLD}\x1b[48;5;99m`,
      marked: '\x1b[35m',
      dim: DIM_GRAY,
      helpKey: HELP_GRAY,
      title: BOLD,
    },
  },
  cyan: {
    name: 'Cyberpunk',
    palette: {
      highlight: `${BOLD}\x1b[48;5;31m`,
      marked: '\x1b[38;5;198m',
      dim: DIM_GRAY,
      helpKey: HELP_GRAY,
      title: `${BOLD}\x1b[96m`,
    },
  },
  amber: {
    name: 'Amber',
    palette: {
      highlight: `${BOLD}\x1b[48;5;130m`,
      marked: '\x1b[38;5;214m',
      dim: '\x1b[38;5;94m',
      helpKey: '\x1b[38;5;136m',
      title: `${BOLD}\x1b[93m`,
    },
  },
  green: {
    name: 'Matrix',
    palette: {
      highlight: `${BOLD}\x1b[48;5;22m`,
      marked: '\x1b[38;5;118m',
      dim: '\x1b[38;5;28m',
      helpKey: '\x1b[38;5;34m',
      title: `${BOLD}\x1b[92m`,
    },
  },
  hotpink: {
    name: 'Hot Pink',
    palette: {
      highlight: `${BOLD}\x1b[48;5;162m`,
      marked: '\x1b[38;5;219m',
      dim: DIM_GRAY,
      helpKey: HELP_GRAY,
      title: `${BOLD}\x1b[95m`,
    },
  },
  ice: {
    name: 'Ice',
    palette: {
      highlight: `${BOLD}\x1b[48;5;24m`,
      marked: '\x1b[38;5;153m',
      dim: '\x1b[38;5;67m',
      helpKey: '\x1b[38;5;110m',
      title: `${BOLD}\x1b[97m`,
    },
  },
  // No colors at all, for terminals that cannot show them
  mono: {
    name: 'Monochrome',
    palette: {
      highlight: '\x1b[1;7m',
      marked: '\x1b[4m',
      dim: '',
      helpKey: '',
      title: BOLD,
    },
  },
};

export const DEFAULT_THEME: PhosphorMode = 'violet';

/**
 * Get theme colors by mode
 */
export function getTheme(mode: PhosphorMode): ThemeColors {
  return themes[mode];
}

export function getPalette(mode: PhosphorMode): Palette {
  return themes[mode].palette;
}

const VALID_THEME_MODES = new Set<string>(Object.keys(themes));

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return VALID_THEME_MODES.has(value);
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';
