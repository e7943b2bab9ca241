/**
 * option-view/model.ts: state and data for the /option-view screen.
 *
 * Pure functions over a Session; the Ink components only render what these
 * return and dispatch ViewActions.
 */

import {
  AccessClass,
  Outcome,
  describeOutcome,
  hiddenFilterFor,
  isBadOutcome,
  optionLabel,
  type OptionChangeEvent,
  type OptionDescriptor,
} from '@switchboard/kernel'
import type { Session } from '../../session/session.js'

// ─── Panels ──────────────────────────────────────────────────────────────────

export enum PanelKind {
  SetO       = 'set_o',
  Shopt      = 'shopt',
  Extensions = 'extensions',
  Changes    = 'changes',
}

export const PANELS: ReadonlyArray<PanelKind> = [
  PanelKind.SetO,
  PanelKind.Shopt,
  PanelKind.Extensions,
  PanelKind.Changes,
]

/** Panels whose rows can be toggled, with the access class they write under. */
const PANEL_ACCESS: Partial<Record<PanelKind, AccessClass>> = {
  [PanelKind.SetO]:  AccessClass.SetO,
  [PanelKind.Shopt]: AccessClass.Shopt,
}

// ─── Rows ────────────────────────────────────────────────────────────────────

export interface OptionRow {
  readonly option: OptionDescriptor
  readonly name: string
  readonly letter: string | undefined
  readonly on: boolean
  readonly readOnly: boolean
}

export interface ExtensionRow {
  readonly id: string
  readonly name: string
  readonly version: string
  readonly builtin: boolean
  readonly optionCount: number
  readonly commandCount: number
}

/** Named options visible under the panel's access class, in name order. */
export function optionRows(session: Session, panel: PanelKind): OptionRow[] {
  const access = PANEL_ACCESS[panel]
  if (access === undefined) return []

  const rows: OptionRow[] = []
  for (const option of session.system.registry.enumerate(hiddenFilterFor(access))) {
    if (option.name === undefined) continue
    rows.push({
      option,
      name:     option.name,
      letter:   option.letter,
      on:       session.system.read(option, access) > 0,
      readOnly: option.flags.readOnly,
    })
  }
  return rows
}

export function extensionRows(session: Session): ExtensionRow[] {
  return session.loader.list().map(manifest => ({
    id:           manifest.extension_id,
    name:         manifest.extension_name,
    version:      manifest.version,
    builtin:      manifest.builtin,
    optionCount:  manifest.options.length,
    commandCount: manifest.commands.length,
  }))
}

export function formatChange(event: OptionChangeEvent): string {
  const label = event.option ?? (event.letter !== null ? `-${event.letter}` : '(unnamed)')
  return `${label} ${event.previous}→${event.requested} ${event.outcome} (${event.access})`
}

export interface ChangeRow {
  readonly text: string
  readonly refused: boolean
}

/** The latest change events, newest first. */
export function changeRows(session: Session, limit = 12): ChangeRow[] {
  return session.system.logger
    .recent()
    .slice(-limit)
    .reverse()
    .map(event => ({ text: formatChange(event), refused: isBadOutcome(event.outcome) }))
}

export function rowCount(session: Session, panel: PanelKind): number {
  switch (panel) {
    case PanelKind.SetO:
    case PanelKind.Shopt:
      return optionRows(session, panel).length
    case PanelKind.Extensions:
      return extensionRows(session).length
    case PanelKind.Changes:
      return changeRows(session).length
  }
}

// ─── Toggling ────────────────────────────────────────────────────────────────

/**
 * Flip the option under the cursor, writing with the panel's access class.
 * Returns the status-line message.
 */
export function toggleOption(session: Session, panel: PanelKind, row: OptionRow): string {
  const access = PANEL_ACCESS[panel]
  if (access === undefined) return ''

  const outcome = session.system.write(row.option, access, row.on ? 0 : 1)
  const label = optionLabel(row.option)
  if (isBadOutcome(outcome)) return `${label}: ${describeOutcome(outcome)}`
  if (outcome === Outcome.Ignored) return `${label}: change ignored`
  return `${label}: ${session.system.read(row.option, access) > 0 ? 'on' : 'off'}`
}

// ─── View state ──────────────────────────────────────────────────────────────

export interface ViewState {
  readonly panel: number
  readonly cursors: ReadonlyArray<number>
  readonly message: string | undefined
}

export const INITIAL_VIEW_STATE: ViewState = {
  panel:   0,
  cursors: PANELS.map(() => 0),
  message: undefined,
}

export type ViewAction =
  | { type: 'NEXT_PANEL' }
  | { type: 'PREV_PANEL' }
  | { type: 'MOVE'; delta: number; rowCount: number }
  | { type: 'MESSAGE'; message: string | undefined }

function clamp(value: number, rows: number): number {
  if (rows <= 0) return 0
  return Math.min(Math.max(value, 0), rows - 1)
}

export function viewReducer(state: ViewState, action: ViewAction): ViewState {
  switch (action.type) {
    case 'NEXT_PANEL':
      return { ...state, panel: (state.panel + 1) % PANELS.length, message: undefined }
    case 'PREV_PANEL':
      return { ...state, panel: (state.panel - 1 + PANELS.length) % PANELS.length, message: undefined }
    case 'MOVE': {
      const cursors = state.cursors.map((cursor, index) =>
        index === state.panel ? clamp(cursor + action.delta, action.rowCount) : cursor,
      )
      return { ...state, cursors }
    }
    case 'MESSAGE':
      return { ...state, message: action.message }
  }
}

export function activePanel(state: ViewState): PanelKind {
  return PANELS[state.panel] ?? PanelKind.SetO
}

export function activeCursor(state: ViewState): number {
  return state.cursors[state.panel] ?? 0
}

/**
 * The slice of `count` rows to show so that `cursor` stays visible,
 * keeping it centred where possible.
 */
export function visibleWindow(count: number, cursor: number, size: number): { start: number; end: number } {
  if (count <= size) return { start: 0, end: count }
  const start = Math.min(Math.max(cursor - Math.floor(size / 2), 0), count - size)
  return { start, end: start + size }
}
