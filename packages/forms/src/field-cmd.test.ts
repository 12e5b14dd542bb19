import { describe, it, expect } from 'vitest'
import { of, throwError } from 'rxjs'
import { FieldCmd, fieldMsg } from './field-cmd'
import type { FieldMsg, FormMsg } from './types'

function run(cmd: ReturnType<FieldCmd>): FormMsg[] {
  const seen: FormMsg[] = []
  for (const effect of cmd) effect((msg) => seen.push(msg))
  return seen
}

const loaded = (values: number): FieldMsg => ({ type: `loaded:${values}` })
const failed = (error: unknown): FieldMsg => ({ type: `failed:${error instanceof Error ? error.message : 'unknown'}` })

describe('FieldCmd', () => {
  it('none issues nothing', () => {
    expect(FieldCmd.none('a')).toEqual([])
  })

  it('ofMsg routes the message to the issuing field', () => {
    expect(run(FieldCmd.ofMsg({ type: 'ping' })('email'))).toEqual([fieldMsg('email', { type: 'ping' })])
  })

  it('ofObservable routes every value', () => {
    const seen = run(FieldCmd.ofObservable(of(1, 2), loaded, failed)('country'))
    expect(seen).toEqual([
      { type: 'form/field', field: 'country', msg: { type: 'loaded:1' } },
      { type: 'form/field', field: 'country', msg: { type: 'loaded:2' } },
    ])
  })

  it('ofObservable routes an error', () => {
    const seen = run(FieldCmd.ofObservable(throwError(() => new Error('offline')), loaded, failed)('country'))
    expect(seen).toEqual([{ type: 'form/field', field: 'country', msg: { type: 'failed:offline' } }])
  })

  it('ofPromise routes the resolved value', async () => {
    const seen = run(FieldCmd.ofPromise(() => Promise.resolve(7), loaded, failed)('country'))
    expect(seen).toEqual([])
    await Promise.resolve()
    await Promise.resolve()
    expect(seen).toEqual([{ type: 'form/field', field: 'country', msg: { type: 'loaded:7' } }])
  })
})
