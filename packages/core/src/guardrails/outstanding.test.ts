import { describe, expect, it } from 'vitest'
import type { TranscriptMessage } from '../router/types'
import { detectOutstanding } from './outstanding'

const customer = (content: string): TranscriptMessage => ({
  role: 'customer',
  content,
})

describe('detectOutstanding', () => {
  it('flags a double charge on a billing question', () => {
    expect(
      detectOutstanding('billing', [customer('You charged me twice this month')])
    ).toEqual({ outstanding: true, trigger: 'double_charge' })
  })

  it('only applies triggers that belong to the category', () => {
    const messages = [customer('Is there anything with nuts? I have an allergy')]

    expect(detectOutstanding('customization', messages)).toEqual({
      outstanding: true,
      trigger: 'allergy',
    })
    expect(detectOutstanding('tracking', messages)).toEqual({
      outstanding: false,
      trigger: null,
    })
  })

  it('applies bereavement triggers to every category', () => {
    expect(
      detectOutstanding('retention', [
        customer('My mother passed away, please stop the boxes'),
      ])
    ).toEqual({ outstanding: true, trigger: 'bereavement' })
  })

  it('prefers the category trigger over the shared ones', () => {
    expect(
      detectOutstanding('retention', [
        customer('My husband passed away and I already cancelled in May'),
      ]).trigger
    ).toBe('charged_after_cancel')
  })

  it('ignores our own messages', () => {
    expect(
      detectOutstanding('tracking', [
        { role: 'assistant', content: 'Packages held at customs can take a week' },
        customer('ok thanks, where is it now?'),
      ]).outstanding
    ).toBe(false)
  })

  it('leaves an ordinary delivery question alone', () => {
    expect(
      detectOutstanding('tracking', [customer('my package never arrived')])
    ).toEqual({ outstanding: false, trigger: null })
  })
})
