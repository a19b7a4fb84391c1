/**
 * Render Model
 *
 * Projects a navigator snapshot onto a two-pane screen: the entry list on the
 * left, the preview on the right, a header above and one status line below.
 * Pure and deterministic; the ink components only draw what comes out.
 */

import { sanitizeName } from './content-sanitizer.js'
import { highlightMatches, type HighlightSegment } from './filter-engine.js'
import { fitImage } from './preview/image-preview.js'
import { isDirectoryLike, type Entry, type NavigatorMode, type NavigatorSnapshot, type PreviewPayload } from './types.js'

export interface Viewport {
  rows: number
  columns: number
}

export interface LayoutConfig {
  headerHeight: number
  statusHeight: number
  /** Top and bottom pane borders */
  borderHeight: number
  /** Share of the width given to the list pane */
  listRatio: number
}

export const defaultLayoutConfig: LayoutConfig = {
  headerHeight: 1,
  statusHeight: 1,
  borderHeight: 2,
  listRatio: 0.4
}

export interface ListRow {
  key: string
  icon: string
  segments: HighlightSegment[]
  selected: boolean
  directory: boolean
  hint: string
}

export interface TextRow {
  gutter: string
  text: string
}

export interface ImageCell {
  /** Colour of the upper pixel, drawn as the glyph */
  top: string
  /** Colour of the lower pixel, drawn as the background */
  bottom: string
}

export type PreviewBody =
  | { kind: 'lines'; rows: TextRow[] }
  | { kind: 'image'; rows: ImageCell[][] }
  | { kind: 'message'; text: string }

export interface ScreenModel {
  header: { badge: string; directory: string }
  list: { rows: ListRow[]; width: number; height: number; position: string; emptyMessage: string | null }
  preview: { title: string; body: PreviewBody; footer: string | null; width: number; height: number }
  statusLine: string
}

export const HALF_BLOCK = '▀'

const HELP: Record<NavigatorMode, string> = {
  browsing: '↑↓/jk move  ←/h parent  →/l/Enter open  Tab choose  / search  v history  Esc quit',
  searching: 'Type to filter  Enter open  Esc clear',
  history: '↑↓/jk move  →/l/Enter open  Tab choose  / search  v/Esc back'
}

const BADGE: Record<NavigatorMode, string> = {
  browsing: 'BROWSE',
  searching: 'SEARCH',
  history: 'HISTORY'
}

/**
 * Human-readable byte count
 *
 * @example
 * formatSize(512) // '512 B'
 * formatSize(1536) // '1.5 KB'
 */
export function formatSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024
    unit++
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${units[unit]}`
}

export function entryIcon(entry: Pick<Entry, 'kind' | 'linkTarget'>): string {
  if (entry.kind === 'directory' || (entry.kind === 'symlink' && entry.linkTarget === 'directory')) return '📁'
  if (entry.kind === 'symlink') return '🔗'
  return '📄'
}

/**
 * First visible row so that `selection` stays inside a window of `height` rows
 */
export function windowStart(selection: number | null, total: number, height: number): number {
  if (selection === null || total <= height) return 0
  const centered = selection - Math.floor(height / 2)
  return Math.min(Math.max(centered, 0), total - height)
}

function hex(value: number): string {
  return Math.round(value).toString(16).padStart(2, '0')
}

/**
 * RGBA pixel composited over black as #rrggbb
 */
export function pixelColor(pixels: Uint8ClampedArray, offset: number): string {
  const alpha = pixels[offset + 3] / 255
  return `#${hex(pixels[offset] * alpha)}${hex(pixels[offset + 1] * alpha)}${hex(pixels[offset + 2] * alpha)}`
}

/**
 * Pair pixel rows into half-block cells, shrinking the image to the pane first
 */
export function imageCells(
  payload: Extract<PreviewPayload, { kind: 'image' }>,
  columns: number,
  rows: number
): ImageCell[][] {
  const image = fitImage(payload, Math.max(columns, 1), Math.max(rows * 2, 1))
  const cells: ImageCell[][] = []

  for (let y = 0; y < image.height; y += 2) {
    const row: ImageCell[] = []
    for (let x = 0; x < image.width; x++) {
      const top = pixelColor(image.pixels, (y * image.width + x) * 4)
      const bottom = y + 1 < image.height ? pixelColor(image.pixels, ((y + 1) * image.width + x) * 4) : '#000000'
      row.push({ top, bottom })
    }
    cells.push(row)
  }

  return cells
}

function gutter(number: number): string {
  return `${String(number).padStart(3)} `
}

function displayName(snapshot: NavigatorSnapshot, entry: Entry): string {
  const name = sanitizeName(entry.name)
  return isDirectoryLike(entry) && snapshot.listing === 'directory' ? `${name}/` : name
}

function projectList(snapshot: NavigatorSnapshot, width: number, height: number): ScreenModel['list'] {
  const total = snapshot.view.length
  const start = windowStart(snapshot.selection, total, height)
  const rows: ListRow[] = []

  for (let row = start; row < Math.min(total, start + height); row++) {
    const entry = snapshot.displayed[snapshot.view[row]]
    if (!entry) continue
    rows.push({
      key: entry.path,
      icon: entryIcon(entry),
      segments: highlightMatches(displayName(snapshot, entry), snapshot.query),
      selected: row === snapshot.selection,
      directory: isDirectoryLike(entry),
      hint: entry.kind === 'file' ? formatSize(entry.size) : ''
    })
  }

  let emptyMessage: string | null = null
  if (total === 0) {
    if (snapshot.query !== '') emptyMessage = 'No matches'
    else if (snapshot.listing === 'history') emptyMessage = 'No history yet'
    else emptyMessage = 'Empty directory'
  }

  const position = total === 0 || snapshot.selection === null ? `0/${total}` : `${snapshot.selection + 1}/${total}`
  return { rows, width, height, position, emptyMessage }
}

function projectPreview(snapshot: NavigatorSnapshot, width: number, height: number): ScreenModel['preview'] {
  const preview = snapshot.preview
  const highlighted = snapshot.selection === null ? undefined : snapshot.displayed[snapshot.view[snapshot.selection]]
  const title = highlighted ? `${entryIcon(highlighted)} ${sanitizeName(highlighted.name)}` : 'Preview'
  const frame = { title, width, height }
  // The first row holds the title
  const bodyHeight = Math.max(height - 1, 1)

  if (preview.status === 'empty') {
    return { ...frame, body: { kind: 'message', text: 'Nothing selected' }, footer: null }
  }
  if (preview.status === 'loading') {
    return { ...frame, body: { kind: 'message', text: 'Loading…' }, footer: null }
  }

  const payload = preview.payload
  const scroll = snapshot.previewScroll

  switch (payload.kind) {
    case 'directory': {
      if (payload.children.length === 0) {
        return { ...frame, body: { kind: 'message', text: 'Empty directory' }, footer: null }
      }
      const rows = payload.children.slice(scroll, scroll + bodyHeight).map((child) => ({
        gutter: `${entryIcon(child)} `,
        text: sanitizeName(child.name)
      }))
      let footer: string | null = null
      if (payload.truncated) footer = `… +${payload.remaining} or more`
      else if (payload.remaining > 0) footer = `… +${payload.remaining} more`
      return { ...frame, body: { kind: 'lines', rows }, footer }
    }
    case 'text':
    case 'document': {
      if (payload.lines.length === 0) {
        const text = payload.kind === 'text' ? 'Empty file' : 'No text found'
        return { ...frame, body: { kind: 'message', text }, footer: payload.kind === 'document' ? `PDF · ${payload.pages} pages` : null }
      }
      const rows = payload.lines.slice(scroll, scroll + bodyHeight).map((line) => ({
        gutter: gutter(line.number),
        text: line.text
      }))
      const parts: string[] = []
      if (payload.kind === 'document') parts.push(`PDF · ${payload.pages} pages`)
      if (payload.truncated) parts.push(`first ${payload.lines.length} lines`)
      return { ...frame, body: { kind: 'lines', rows }, footer: parts.length > 0 ? parts.join(' · ') : null }
    }
    case 'image':
      return {
        ...frame,
        body: { kind: 'image', rows: imageCells(payload, width, bodyHeight) },
        footer: `${payload.format.toUpperCase()} ${payload.sourceWidth}×${payload.sourceHeight}`
      }
    case 'binary': {
      const text = payload.note ?? `Binary file · ${formatSize(payload.size)}`
      return { ...frame, body: { kind: 'message', text }, footer: null }
    }
    case 'empty':
      return { ...frame, body: { kind: 'message', text: 'Nothing selected' }, footer: null }
  }
}

function statusLine(snapshot: NavigatorSnapshot): string {
  if (snapshot.mode === 'searching') {
    return `/${snapshot.query}  (${snapshot.view.length} matches)`
  }
  return snapshot.status ?? HELP[snapshot.mode]
}

/**
 * Project a snapshot onto the screen
 *
 * Pane heights exclude the header, status line and pane borders.
 */
export function projectScreen(
  snapshot: NavigatorSnapshot,
  viewport: Viewport,
  config: LayoutConfig = defaultLayoutConfig
): ScreenModel {
  const paneHeight = Math.max(
    3,
    viewport.rows - config.headerHeight - config.statusHeight - config.borderHeight
  )
  const listWidth = Math.max(10, Math.floor(viewport.columns * config.listRatio))
  // Two columns of border on each pane
  const previewWidth = Math.max(10, viewport.columns - listWidth - 4)

  return {
    header: { badge: BADGE[snapshot.mode], directory: sanitizeName(snapshot.directory) },
    list: projectList(snapshot, listWidth - 2, paneHeight),
    preview: projectPreview(snapshot, previewWidth, paneHeight),
    statusLine: snapshot.mode === 'searching' && snapshot.status ? `${statusLine(snapshot)}  ${snapshot.status}` : statusLine(snapshot)
  }
}
