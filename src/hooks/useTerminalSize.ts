import { useStdout } from 'ink'
import { useEffect, useState } from 'react'

import type { Viewport } from '../render-model.js'

const FALLBACK: Viewport = { rows: 24, columns: 80 }

/**
 * Current terminal size, updated on resize
 */
export function useTerminalSize(): Viewport {
  const { stdout } = useStdout()
  const read = (): Viewport => ({
    rows: stdout.rows || FALLBACK.rows,
    columns: stdout.columns || FALLBACK.columns
  })
  const [size, setSize] = useState<Viewport>(read)

  useEffect(() => {
    const onResize = () => setSize(read())
    stdout.on('resize', onResize)
    return () => {
      stdout.off('resize', onResize)
    }
  }, [stdout])

  return size
}
