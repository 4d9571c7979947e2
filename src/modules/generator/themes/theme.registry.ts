import type { Theme, ThemeName } from '../../../types/theme.types'

export const DEFAULT_THEME: ThemeName = 'professional'

export const THEME_NAMES: readonly ThemeName[] = ['professional', 'modern', 'elegant', 'minimal']

const THEMES: Readonly<Record<ThemeName, Theme>> = {
  professional: {
    name: 'professional',
    description: 'Clean and traditional - ideal for corporate roles',
    primaryColor: '#2c3e50',
    secondaryColor: '#7f8c8d',
    accentColor: '#3498db',
    fontFamily: 'Calibri',
    pdfFont: 'LiberationSans',
    pdfBoldFont: 'LiberationSans-Bold'
  },
  modern: {
    name: 'modern',
    description: 'Bold colors and contemporary layout - for creative industries',
    primaryColor: '#1a1a2e',
    secondaryColor: '#4a4a4a',
    accentColor: '#e94560',
    fontFamily: 'Arial',
    pdfFont: 'LiberationSans',
    pdfBoldFont: 'LiberationSans-Bold'
  },
  elegant: {
    name: 'elegant',
    description: 'Refined typography with subtle accents - for executive positions',
    primaryColor: '#2d3436',
    secondaryColor: '#636e72',
    accentColor: '#6c5ce7',
    fontFamily: 'Times New Roman',
    pdfFont: 'LiberationSerif',
    pdfBoldFont: 'LiberationSerif-Bold'
  },
  minimal: {
    name: 'minimal',
    description: 'Simple black and white - maximum readability',
    primaryColor: '#000000',
    secondaryColor: '#555555',
    accentColor: '#000000',
    fontFamily: 'Calibri',
    pdfFont: 'LiberationSans',
    pdfBoldFont: 'LiberationSans-Bold'
  }
}

export function isThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some((name) => name === value)
}

/**
 * Resolve a style name to its theme. Matching ignores case and surrounding
 * whitespace; unknown names get the professional theme.
 */
export function themeFor(name?: string): Theme {
  const key = name?.trim().toLowerCase() ?? DEFAULT_THEME
  return isThemeName(key) ? THEMES[key] : THEMES[DEFAULT_THEME]
}
