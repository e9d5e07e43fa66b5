import { join } from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { frameToText, paintFrame } from '../../src/cli/ui/terminal-ui'
import { openPackDetail, terminalResize } from '../../src/tui/message'
import { createInitialState, update } from '../../src/tui/update'
import { render } from '../../src/tui/view'
import { testContext } from '../helpers/context'
import { createStorageFixture, samplePack, type StorageFixture } from '../helpers/fixtures'

describe('render', () => {
  let fixture: StorageFixture
  const ctx = testContext()

  beforeEach(() => {
    fixture = createStorageFixture()
  })

  afterEach(() => {
    fixture.cleanup()
  })

  it('is pure', () => {
    const state = createInitialState(fixture.storage, ctx)
    expect(render(state)).toEqual(render(state))
  })

  it('paints the main view on a narrow terminal', () => {
    const state = createInitialState(fixture.storage, ctx)
    const rows = frameToText(render(state)).split('\n')

    expect(rows).toHaveLength(24)
    expect(rows[0]).toBe(` packlens ${fixture.storage}`)
    expect(rows.slice(1, 5)).toEqual(['> > objects/', '  > refs/', '    config', '    HEAD'])
    expect(rows.slice(5, 9)).toEqual(['', '', '', ''])
    expect(rows[9].startsWith('-- objects')).toBe(true)
    expect(rows[10]).toBe('objects')
    expect(rows[22]).toBe('')
    expect(rows[23]).toBe('j/k move  enter open  h collapse  t expand  J/K preview  r refresh  q quit')
  })

  it('paints every row at full width', () => {
    const state = update(createInitialState(fixture.storage, ctx), terminalResize(120, 30), ctx)
    const rows = paintFrame(render(state), { color: false })
    expect(rows).toHaveLength(30)
    for (const row of rows) expect(row).toHaveLength(120)
    expect(rows[1].slice(48, 49)).toBe('|')
  })

  it('paints pack entries', () => {
    const state = update(createInitialState(fixture.storage, ctx), openPackDetail(fixture.packPath), ctx)
    const frame = render(state)
    const rows = frameToText(frame).split('\n')
    const { offsets } = samplePack()

    expect(frame.title).toBe('Pack pack-sample.pack (v2, 3 objects, checksum ok)')
    expect(rows[1]).toBe('> #0    blob      @12       12')
    expect(rows[2].startsWith(`  #1    ofs_delta @${offsets[1]}`)).toBe(true)
    expect(rows[3].startsWith(`  #2    ref_delta @${offsets[2]}`)).toBe(true)
    expect(frame.status).toBeUndefined()
  })

  it('shows an error display when nothing decoded', () => {
    const bad = join(fixture.storage, 'config')
    const frame = render(update(createInitialState(fixture.storage, ctx), openPackDetail(bad), ctx))
    const rows = frameToText(frame).split('\n')
    expect(rows.slice(1, 5)).toEqual([
      'Pack could not be decoded',
      '',
      'DecodeError [INVALID_SIGNATURE]: Invalid pack signature: expected "PACK", got "[cor"',
      bad,
    ])
  })

  it('colors output only when asked', () => {
    const frame = render(createInitialState(fixture.storage, ctx))
    expect(paintFrame(frame, { color: false }).join('')).not.toContain('\x1b[')
    expect(paintFrame(frame, { color: true })[0].startsWith('\x1b[7m')).toBe(true)
  })
})
