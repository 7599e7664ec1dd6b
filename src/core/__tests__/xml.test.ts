import { describe, it, expect } from 'vitest'
import { ThreeMFParseError } from '../errors'
import { childElements, localName, parseXml, readAttribute, toFloat, toInt } from '../xml'

describe('xml helpers', () => {
  const doc = parseXml(`<root xmlns:m="urn:test">
    text
    <!-- comment -->
    <a empty="" value="3"/>
    <m:b/>
    <a/>
  </root>`)
  const root = doc.documentElement

  it('lists element children only, in order', () => {
    expect(childElements(root).map(localName)).toEqual(['a', 'b', 'a'])
  })

  it('keeps the prefix in nodeName only', () => {
    expect(childElements(root)[1].nodeName).toBe('m:b')
  })

  it('tells absent attributes from empty ones', () => {
    const a = childElements(root)[0]
    expect(readAttribute(a, 'value')).toBe('3')
    expect(readAttribute(a, 'empty')).toBe('')
    expect(readAttribute(a, 'missing')).toBeUndefined()
  })

  it('coerces numbers like the file format expects', () => {
    expect(toInt('12abc')).toBe(12)
    expect(toInt('-3')).toBe(-3)
    expect(toInt('abc')).toBe(0)
    expect(toInt(undefined)).toBe(0)
    expect(toFloat('1.5e2')).toBe(150)
    expect(toFloat('-0.25')).toBe(-0.25)
    expect(toFloat('')).toBe(0)
  })

  it('rejects text without a document element', () => {
    expect(() => parseXml('')).toThrow(ThreeMFParseError)
    expect(() => parseXml('   ')).toThrow(ThreeMFParseError)
  })

  it('rejects markup the parser only warns about', () => {
    expect(() => parseXml('<a><b></c></a>')).toThrow(ThreeMFParseError)
  })
})
