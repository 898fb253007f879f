import { addDays, format, type Locale } from 'date-fns'
import { da, de, enGB, enUS, es, fi, fr, it, ja, nb, nl, pl, pt, ptBR, ru, sv, zhCN } from 'date-fns/locale'

export const DEFAULT_LOCALE = 'en_US'

const LOCALES: Record<string, Locale> = {
  da,
  de,
  en: enUS,
  en_GB: enGB,
  en_US: enUS,
  es,
  fi,
  fr,
  it,
  ja,
  nb,
  nl,
  pl,
  pt,
  pt_BR: ptBR,
  ru,
  sv,
  zh: zhCN,
  zh_CN: zhCN,
}

const warned = new Set<string>()

// 'fr-FR', 'fr_FR' and 'fr_fr' all name the same locale.
export function normalizeLocaleId(id: string): string {
  const [language = '', region] = id.trim().replace('-', '_').split('_')
  return region ? `${language.toLowerCase()}_${region.toUpperCase()}` : language.toLowerCase()
}

export function isSupportedLocale(id: string): boolean {
  const normalized = normalizeLocaleId(id)
  return normalized in LOCALES || normalized.split('_')[0] in LOCALES
}

export function resolveLocale(id: string): Locale {
  const normalized = normalizeLocaleId(id)
  const exact = LOCALES[normalized]
  if (exact) return exact
  const language = LOCALES[normalized.split('_')[0]]
  if (language) return language

  if (!warned.has(id)) {
    warned.add(id)
    console.warn(`Unsupported locale "${id}", falling back to ${DEFAULT_LOCALE}`)
  }
  return enUS
}

export function supportedLocales(): string[] {
  return Object.keys(LOCALES).sort()
}

// 2024-01-07 is a Sunday
const REFERENCE_SUNDAY = new Date(2024, 0, 7)

/** Abbreviated weekday names, starting on the given weekday (0 = Sunday). */
export function getDayNames(locale: Locale, weekStartsOn: 0 | 1): string[] {
  const names: string[] = []
  for (let i = 0; i < 7; i++) {
    names.push(format(addDays(REFERENCE_SUNDAY, i + weekStartsOn), 'EEE', { locale }))
  }
  return names
}

export function getMonthName(locale: Locale, month: number): string {
  const name = format(new Date(2024, month - 1, 1), 'LLLL', { locale })
  return name.charAt(0).toLocaleUpperCase() + name.slice(1)
}
