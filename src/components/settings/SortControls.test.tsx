// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from '@testing-library/react'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { SortControls } from './SortControls'

describe('SortControls', () => {
  afterEach(() => {
    cleanup()
  })

  it('reports a new sort method', () => {
    const onChange = vi.fn()
    render(<SortControls settings={{ method: 'name_asc', groupByStatus: true }} onChange={onChange} />)

    fireEvent.change(screen.getByRole('combobox'), { target: { value: 'ports_desc' } })
    expect(onChange).toHaveBeenCalledWith({ method: 'ports_desc' })
  })

  it('reports the grouping toggle', () => {
    const onChange = vi.fn()
    render(<SortControls settings={{ method: 'name_asc', groupByStatus: true }} onChange={onChange} />)

    fireEvent.click(screen.getByRole('checkbox', { name: 'Running services first' }))
    expect(onChange).toHaveBeenCalledWith({ groupByStatus: false })
  })

  it('lists every method', () => {
    render(<SortControls settings={{ method: 'ports_asc', groupByStatus: false }} onChange={() => {}} />)
    expect(screen.getAllByRole('option').map((o) => o.textContent)).toEqual([
      'Name (A-Z)',
      'Name (Z-A)',
      'Port (low to high)',
      'Port (high to low)',
    ])
  })
})
