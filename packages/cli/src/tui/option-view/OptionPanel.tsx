import React from 'react'
import { Box, Text } from 'ink'
import { Panel } from './Panel.js'
import { visibleWindow, type OptionRow } from './model.js'

const WINDOW_SIZE = 16

interface OptionPanelProps {
  label: string
  rows: ReadonlyArray<OptionRow>
  cursor: number
  isFocused: boolean
}

/**
 * OptionPanel: one option per line with ● / ○ dots, the letter alias
 * and an `ro` marker for read-only options. The cursor row is highlighted while
 * the panel has focus.
 */
export function OptionPanel({ label, rows, cursor, isFocused }: OptionPanelProps): React.ReactElement {
  const onCount = rows.filter(row => row.on).length
  const { start, end } = visibleWindow(rows.length, cursor, WINDOW_SIZE)

  return (
    <Panel
      title={label}
      summary={`${onCount}/${rows.length} on`}
      isFocused={isFocused}
      hiddenAbove={start}
      hiddenBelow={rows.length - end}
    >
      {rows.slice(start, end).map((row, offset) => {
        const selected = isFocused && start + offset === cursor
        return (
          <Box key={row.name} justifyContent="space-between">
            <Box gap={1}>
              <Text color={row.on ? '#81C784' : '#444444'}>{row.on ? '●' : '○'}</Text>
              <Text color={selected ? '#4FC3F7' : row.on ? '#F2F2EC' : '#666666'} inverse={selected}>
                {row.name}
              </Text>
            </Box>
            <Text color="#666666">
              {row.readOnly ? 'ro ' : ''}{row.letter !== undefined ? `-${row.letter}` : ''}
            </Text>
          </Box>
        )
      })}
    </Panel>
  )
}
