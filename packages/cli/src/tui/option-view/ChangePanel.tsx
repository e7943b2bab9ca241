import React from 'react'
import { Text } from 'ink'
import { Panel } from './Panel.js'
import type { ChangeRow } from './model.js'

interface ChangePanelProps {
  rows: ReadonlyArray<ChangeRow>
  isFocused: boolean
}

/**
 * ChangePanel: the latest option writes, newest first, refused ones in red.
 */
export function ChangePanel({ rows, isFocused }: ChangePanelProps): React.ReactElement {
  return (
    <Panel
      title="recent changes"
      summary={`${rows.length}`}
      isFocused={isFocused}
      emptyText={rows.length === 0 ? 'no changes yet' : undefined}
    >
      {rows.map((row, index) => (
        <Text key={index} color={row.refused ? '#CF6679' : '#C8C8C0'}>{row.text}</Text>
      ))}
    </Panel>
  )
}
