import React from 'react'
import { Box, Text } from 'ink'

const FOCUS_COLOR = '#4FC3F7'
const IDLE_COLOR  = '#242424'
const MUTED_COLOR = '#666666'

interface PanelProps {
  title: string
  /** Right-hand summary on the title row. */
  summary?: string | undefined
  isFocused: boolean
  /** Rows hidden above and below the visible window. */
  hiddenAbove?: number
  hiddenBelow?: number
  /** Shown instead of the children when there is nothing to list. */
  emptyText?: string | undefined
  children?: React.ReactNode
}

function ScrollHint({ count, arrow }: { count: number; arrow: string }): React.ReactElement | null {
  if (count <= 0) return null
  return <Text color={MUTED_COLOR}>{arrow} {count} more</Text>
}

/**
 * Panel: bordered box for one /option-view panel. The border lights up
 * while the panel has keyboard focus.
 */
export function Panel({
  title,
  summary,
  isFocused,
  hiddenAbove = 0,
  hiddenBelow = 0,
  emptyText,
  children,
}: PanelProps): React.ReactElement {
  return (
    <Box
      flexGrow={1}
      flexBasis={0}
      flexDirection="column"
      borderStyle={isFocused ? 'bold' : 'single'}
      borderColor={isFocused ? FOCUS_COLOR : IDLE_COLOR}
      paddingX={1}
    >
      <Box justifyContent="space-between">
        <Text color={FOCUS_COLOR} bold={isFocused}>{title}</Text>
        {summary !== undefined && <Text color={MUTED_COLOR}>{summary}</Text>}
      </Box>

      <ScrollHint count={hiddenAbove} arrow="↑" />
      {emptyText !== undefined ? <Text color="#444444">{emptyText}</Text> : children}
      <ScrollHint count={hiddenBelow} arrow="↓" />
    </Box>
  )
}
