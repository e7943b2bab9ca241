import React, { useReducer, useState } from 'react'
import { Box, Text, useInput, useApp, useStdout } from 'ink'
import chalk from 'chalk'
import type { Session } from '../../session/session.js'
import { ChangePanel } from './ChangePanel.js'
import { ExtensionPanel } from './ExtensionPanel.js'
import { OptionPanel } from './OptionPanel.js'
import {
  INITIAL_VIEW_STATE,
  PanelKind,
  activeCursor,
  activePanel,
  changeRows,
  extensionRows,
  optionRows,
  rowCount,
  toggleOption,
  viewReducer,
} from './model.js'

export interface OptionViewProps {
  session: Session
}

/**
 * OptionView: full-screen Ink view for /option-view.
 *
 * Mounts when the readline shell issues /ov or /option-view.
 * Unmounts on 'q' or Escape → restores readline.
 *
 * Keyboard:
 *   q / Escape  → exit
 *   Tab         → next panel
 *   Shift+Tab   → previous panel
 *   ↑ / ↓       → move within the panel
 *   Space       → toggle the option under the cursor
 */
export function OptionView({ session }: OptionViewProps): React.ReactElement {
  const { exit: inkExit } = useApp()
  const [state, dispatch] = useReducer(viewReducer, INITIAL_VIEW_STATE)
  // Options live in the session, outside React; bump to re-read them.
  const [, setRevision] = useState(0)
  const { stdout } = useStdout()

  const panel  = activePanel(state)
  const cursor = activeCursor(state)

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      inkExit()
      return
    }
    if (key.tab && !key.shift) {
      dispatch({ type: 'NEXT_PANEL' })
      return
    }
    if (key.tab && key.shift) {
      dispatch({ type: 'PREV_PANEL' })
      return
    }
    if (key.upArrow || key.downArrow) {
      dispatch({ type: 'MOVE', delta: key.upArrow ? -1 : 1, rowCount: rowCount(session, panel) })
      return
    }
    if (input === ' ') {
      const row = optionRows(session, panel)[cursor]
      if (row === undefined) return
      dispatch({ type: 'MESSAGE', message: toggleOption(session, panel, row) })
      setRevision(r => r + 1)
    }
  })

  const cols = stdout.columns ?? 80

  const slLeft  = ` ◈ $- ${session.flags()} · ${state.message ?? 'space toggles the selected option'}`
  const slRight = `q quit · tab panels · ↑↓ move `
  const slFill  = ' '.repeat(Math.max(0, cols - slLeft.length - slRight.length))
  const slLine  = chalk.bgHex('#0277BD').white(slLeft + slFill + slRight)

  return (
    <Box flexDirection="column">
      <Box paddingX={1}>
        <Text color="#4FC3F7" bold>◈ SWITCHBOARD</Text>
        <Text color="#666666">  options · extensions · changes</Text>
      </Box>

      <Box flexDirection="row">
        <OptionPanel
          label="set -o"
          rows={optionRows(session, PanelKind.SetO)}
          cursor={state.cursors[0] ?? 0}
          isFocused={panel === PanelKind.SetO}
        />
        <OptionPanel
          label="shopt"
          rows={optionRows(session, PanelKind.Shopt)}
          cursor={state.cursors[1] ?? 0}
          isFocused={panel === PanelKind.Shopt}
        />
      </Box>

      <Box flexDirection="row">
        <ExtensionPanel
          rows={extensionRows(session)}
          cursor={state.cursors[2] ?? 0}
          isFocused={panel === PanelKind.Extensions}
        />
        <ChangePanel rows={changeRows(session)} isFocused={panel === PanelKind.Changes} />
      </Box>

      <Box>
        <Text>{slLine}</Text>
      </Box>
    </Box>
  )
}
