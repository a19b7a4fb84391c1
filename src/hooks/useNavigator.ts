import { useCallback, useSyncExternalStore } from 'react'

import { debugLog } from '../debug-log.js'
import type { NavigatorKey } from '../key-bindings.js'
import type { Navigator } from '../navigator.js'
import type { NavigatorSnapshot } from '../types.js'

/**
 * Subscribe a component to a navigator's snapshots.
 *
 * The navigator queues keys itself, so `dispatch` can be called straight from
 * an input handler without awaiting.
 *
 * @example
 * const [snapshot, dispatch] = useNavigator(navigator)
 * useInput((input, key) => toNavigatorKeys(input, key).forEach(dispatch))
 */
export function useNavigator(navigator: Navigator) {
  const subscribe = useCallback((onChange: () => void) => navigator.subscribe(onChange), [navigator])
  const getSnapshot = useCallback((): NavigatorSnapshot => navigator.getSnapshot(), [navigator])
  const snapshot = useSyncExternalStore(subscribe, getSnapshot)

  const dispatch = useCallback(
    (key: NavigatorKey) => {
      navigator.dispatch(key).catch((error: unknown) => {
        debugLog(`[ui] dispatch failed: ${String(error)}`)
      })
    },
    [navigator]
  )

  return [snapshot, dispatch] as const
}
