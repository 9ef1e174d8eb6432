/**
 * Color roles for terminal output. Values are chalk color names.
 */
export const Colors = {
  Primary: 'greenBright',
  Secondary: 'green',
  Accent: 'cyanBright',
  Dim: 'gray',
  Success: 'greenBright',
  Warning: 'yellow',
  Error: 'redBright',
  Reasoning: 'gray',
  Added: 'green',
  Removed: 'red',
} as const;

export type ColorRole = keyof typeof Colors;
