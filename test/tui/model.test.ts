import { describe, it, expect } from 'vitest'
import { computeLayout } from '../../src/tui/model'

describe('computeLayout', () => {
  it('stacks panes on narrow terminals', () => {
    expect(computeLayout(80, 24)).toEqual({
      width: 80,
      height: 24,
      orientation: 'rows',
      bodyHeight: 21,
      listHeight: 8,
      contentHeight: 12,
      listWidth: 80,
      contentWidth: 80,
    })
  })

  it('puts panes side by side on wide terminals', () => {
    expect(computeLayout(120, 30)).toEqual({
      width: 120,
      height: 30,
      orientation: 'columns',
      bodyHeight: 27,
      listHeight: 27,
      contentHeight: 27,
      listWidth: 48,
      contentWidth: 71,
    })
  })

  it('enforces a minimum size', () => {
    const layout = computeLayout(5, 2)
    expect(layout.width).toBe(20)
    expect(layout.height).toBe(9)
    expect(layout.listHeight).toBe(3)
    expect(layout.contentHeight).toBe(2)
  })

  it('defaults to 80x24', () => {
    expect(computeLayout()).toEqual(computeLayout(80, 24))
  })
})
