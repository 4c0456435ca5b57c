import type { Language } from '~/config/constants'
import type { BotCommand } from '~/core/types/telegram'
import en from '~/locales/en.json'
import fa from '~/locales/fa.json'

type Catalog = typeof en

export type ResponseKey = {
    [K in keyof Catalog]: Catalog[K] extends string ? K : never
}[keyof Catalog]

export type CommandListKey = {
    [K in keyof Catalog]: Catalog[K] extends BotCommand[] ? K : never
}[keyof Catalog]

// fa may lag behind en; missing keys fall back to en
const catalogs: Record<Language, Partial<Catalog>> = { en, fa }

/**
 * Localized response text with `{name}` placeholders filled in.
 * Unknown placeholders are left as written.
 */
export function t(key: ResponseKey, lang: Language = 'en', params: Record<string, string | number> = {}): string {
    const template = catalogs[lang][key] ?? en[key]
    return template.replace(/\{(\w+)\}/g, (match, name: string) =>
        name in params ? String(params[name]) : match
    )
}

/**
 * Localized command list for setMyCommands
 */
export function commandList(key: CommandListKey, lang: Language = 'en'): BotCommand[] {
    return catalogs[lang][key] ?? en[key]
}
