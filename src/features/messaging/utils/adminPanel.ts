/**
 * Text and keyboard of the admin control panel sent under every delivered message.
 *
 * Layout:
 *   [👀 Read]                 (dropped once read)
 *   [🚫 Block | 👋 Answer]    (Block swaps to 🕊️ Unblock while blocked)
 */

import { CALLBACKS, EMOJI, type Language } from '~/config/constants'
import { t } from '~/core/i18n/responses'
import { escapeHtml } from '~/core/utils/helpers'
import { createCallbackButton, type InlineKeyboard } from '~/core/utils/telegramButtons'
import type { AnonymousOption } from '~/features/correlation/services/Correlator'

export const ADMIN_CONTROLS_LABEL = t('adminControls')
export const BLOCKED_MARKER = t('blockedMarker')

export interface AdminPanelPayloads {
    readPayload?: string
    blockPayload: string
    answerPayload: string
}

export function adminPanelHeader(option: AnonymousOption, label?: string): string {
    switch (option) {
        case 'NoHistory':
            return `${EMOJI.NO_HISTORY}\n${ADMIN_CONTROLS_LABEL}`
        case 'WithHistory':
            return `${EMOJI.WITH_HISTORY} ${label ?? ''}\n${ADMIN_CONTROLS_LABEL}`
        case 'Forward':
            return `${EMOJI.FORWARD} <code>${escapeHtml(label ?? '')}</code>\n${ADMIN_CONTROLS_LABEL}`
    }
}

export function buildAdminKeyboard(payloads: AdminPanelPayloads, blocked = false): InlineKeyboard {
    const controls = [
        createCallbackButton(blocked ? t('unblockButton') : t('blockButton'), payloads.blockPayload),
        createCallbackButton(t('answerButton'), payloads.answerPayload),
    ]
    return payloads.readPayload ? [[createCallbackButton(t('readButton'), payloads.readPayload)], controls] : [controls]
}

/**
 * Recover the payloads from a panel keyboard, with or without its Read row
 */
export function parseAdminKeyboard(keyboard: InlineKeyboard): AdminPanelPayloads | null {
    const rows = keyboard.filter((row) => row.length > 0)
    const controls = rows[rows.length - 1]
    if (!controls || controls.length < 2) {
        return null
    }

    const [block, answer] = controls
    if (!('data' in block) || !('data' in answer)) {
        return null
    }

    const readButton = rows.length > 1 ? rows[0][0] : undefined
    const readPayload = readButton && 'data' in readButton ? readButton.data : undefined
    return { ...(readPayload ? { readPayload } : {}), blockPayload: block.data, answerPayload: answer.data }
}

/**
 * Drop the pressed Read button, keeping every other button in place
 */
export function removeReadButton(keyboard: InlineKeyboard, readPayload: string): InlineKeyboard {
    return keyboard
        .map((row) => row.filter((btn) => !('data' in btn && btn.data === readPayload)))
        .filter((row) => row.length > 0)
}

export function markBlocked(text: string): string {
    if (text.includes(BLOCKED_MARKER)) {
        return text
    }
    return text.replace(ADMIN_CONTROLS_LABEL, `${BLOCKED_MARKER}\n${ADMIN_CONTROLS_LABEL}`)
}

export function markUnblocked(text: string): string {
    return text.replace(`${BLOCKED_MARKER}\n`, '')
}

export function anonymousChoiceKeyboard(lang: Language): InlineKeyboard {
    return [
        [createCallbackButton(t('choiceNoHistory', lang), CALLBACKS.ANON_NO_HISTORY)],
        [createCallbackButton(t('choiceWithHistory', lang), CALLBACKS.ANON_WITH_HISTORY)],
        [createCallbackButton(t('choiceForward', lang), CALLBACKS.ANON_FORWARD)],
    ]
}

export function readKeyboard(readPayload: string): InlineKeyboard {
    return [[createCallbackButton(t('readButton'), readPayload)]]
}

export function cancelReplyKeyboard(lang: Language): InlineKeyboard {
    return [[createCallbackButton(t('adminCancelReplyButton', lang), CALLBACKS.ADMIN_CANCEL_ANSWER)]]
}
