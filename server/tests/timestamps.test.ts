import assert from 'node:assert/strict'
import test from 'node:test'
import { formatDuration, formatTimestamp } from '../src/utils/timestamps'

test('formatTimestamp pads minutes and seconds', () => {
  assert.equal(formatTimestamp(0), '00:00')
  assert.equal(formatTimestamp(65.9), '01:05')
  assert.equal(formatTimestamp(3599), '59:59')
})

test('formatTimestamp adds hours from one hour on', () => {
  assert.equal(formatTimestamp(3600), '01:00:00')
  assert.equal(formatTimestamp(5025), '01:23:45')
})

test('formatTimestamp treats negative input as zero', () => {
  assert.equal(formatTimestamp(-3), '00:00')
})

test('formatDuration leaves the leading unit unpadded', () => {
  assert.equal(formatDuration(187), '3:07')
  assert.equal(formatDuration(5025), '1:23:45')
})
