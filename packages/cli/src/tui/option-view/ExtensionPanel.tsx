import React from 'react'
import { Box, Text } from 'ink'
import { Panel } from './Panel.js'
import type { ExtensionRow } from './model.js'

interface ExtensionPanelProps {
  rows: ReadonlyArray<ExtensionRow>
  cursor: number
  isFocused: boolean
}

/**
 * ExtensionPanel: loaded extensions with their option and command counts.
 */
export function ExtensionPanel({ rows, cursor, isFocused }: ExtensionPanelProps): React.ReactElement {
  return (
    <Panel title="extensions" summary={`${rows.length} loaded`} isFocused={isFocused}>
      {rows.map((row, index) => (
        <Box key={row.id} justifyContent="space-between">
          <Text color={isFocused && index === cursor ? '#4FC3F7' : '#F2F2EC'}>
            {row.id} <Text color="#666666">{row.version}{row.builtin ? ' builtin' : ''}</Text>
          </Text>
          <Text color="#666666">{row.optionCount} opts · {row.commandCount} cmds</Text>
        </Box>
      ))}
    </Panel>
  )
}
