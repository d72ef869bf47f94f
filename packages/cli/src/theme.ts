/** Terminal palette: slate background tones with teal accents. */
export const THEME = {
  /** Teal: active agents, labels, highlights */
  primary: '#2DD4BF',
  /** Deep teal: borders, decorations */
  accent: '#0D9488',
  /** Dark teal: header border */
  accentDark: '#115E59',
  /** Gray: inactive text */
  dim: '#6B7280',
  /** Dark gray: inactive borders */
  dimBorder: '#374151',
  /** Green: valid decision */
  success: '#22C55E',
  /** Red: failed agent, fatal stop */
  error: '#EF4444',
  /** Amber: repairs, quota denials, threshold misses */
  warning: '#F59E0B',
  /** White: primary text */
  text: 'white',
  /** Light gray: secondary text */
  textDim: '#9CA3AF',
} as const;
