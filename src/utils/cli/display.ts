import boxen, { Options as BoxenOptions } from 'boxen';

/**
 * Standard boxen configuration used for every boxed message
 */
const DEFAULT_BOX_OPTIONS: BoxenOptions = {
  padding: 1,
  margin: { top: 1, bottom: 1, left: 1, right: 1 },
  borderStyle: 'round',
  titleAlignment: 'center',
};

export const DisplayThemes = {
  INFO: 'blue',
  SUCCESS: 'green',
  WARNING: 'yellow',
  ERROR: 'red',
} as const;

export type DisplayTheme = (typeof DisplayThemes)[keyof typeof DisplayThemes];

interface DisplayBoxOptions {
  title?: string;
  theme?: DisplayTheme;
  toStderr?: boolean;
}

/**
 * Creates a standardized boxen display with consistent styling
 */
export const createDisplayBox = (content: string, options: DisplayBoxOptions = {}): string => {
  const { theme = DisplayThemes.INFO, title } = options;

  const boxOptions: BoxenOptions = {
    ...DEFAULT_BOX_OPTIONS,
    borderColor: theme,
    ...(title ? { title } : {}),
  };

  return boxen(content, boxOptions);
};

export const displayBox = (content: string, options: DisplayBoxOptions = {}): void => {
  const box = createDisplayBox(content, options);
  if (options.toStderr) {
    console.error(box);
  } else {
    console.log(box);
  }
};

/**
 * Pre-configured display functions. Errors and warnings go to stderr.
 */
export const display = {
  success: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.SUCCESS, title }),

  error: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.ERROR, title, toStderr: true }),

  warning: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.WARNING, title, toStderr: true }),

  info: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.INFO, title }),
};
