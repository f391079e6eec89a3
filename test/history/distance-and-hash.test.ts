import { describe, expect, it } from 'vitest'

import { createResolutionCache } from '../../core/cache/create-resolution-cache'
import { distanceAndHash } from '../../core/history/distance-and-hash'
import { createFakeHistory } from '../helpers/create-fake-history'
import { createPathSet } from '../../core/changes/create-path-set'
import { parseTag } from '../../core/history/parse-tag'

let commits = ['1111111aa', '2222222bb', '3333333cc', '4444444dd', '5555555ee']

describe('distanceAndHash', () => {
  it('counts commits from the tag to the last change', () => {
    let { history } = createFakeHistory({
      touching: { 'images/app': '4444444dd' },
      tags: { '1.2.3': '2222222bb' },
      commits,
    })

    let point = distanceAndHash(
      history,
      parseTag('1.2.3'),
      createPathSet('images/app'),
    )
    expect(point.distance).toBe(2)
    expect(point.commit).toEqual({
      abbreviatedHash: '4444444',
      hash: '4444444dd',
    })
    expect(point.tag?.name).toBe('1.2.3')
  })

  it('counts from the commit the tag points at', () => {
    let { history, calls } = createFakeHistory({
      touching: { 'images/app': '4444444dd' },
      tags: { 'v1.2.3': '2222222bb' },
      commits,
    })

    distanceAndHash(history, parseTag('v1.2.3'), createPathSet('images/app'))
    expect(calls).toEqual([
      'lastCommitTouching images/app',
      'countCommits 2222222bb..4444444dd',
    ])
  })

  it('uses the tagged commit when nothing changed since the tag', () => {
    let { history } = createFakeHistory({
      touching: { 'images/app': '1111111aa' },
      tags: { '1.2.3': '2222222bb' },
      commits,
    })

    let point = distanceAndHash(
      history,
      parseTag('1.2.3'),
      createPathSet('images/app'),
    )
    expect(point.distance).toBe(0)
    expect(point.commit.abbreviatedHash).toBe('2222222')
  })

  it('counts every commit up to the change without a tag', () => {
    let { history } = createFakeHistory({
      touching: { chart: '3333333cc' },
      commits,
    })

    let point = distanceAndHash(history, null, createPathSet('chart'))
    expect(point.distance).toBe(3)
    expect(point.commit.abbreviatedHash).toBe('3333333')
  })

  it('falls back to HEAD when neither paths nor tags exist', () => {
    let { history } = createFakeHistory({ commits })

    let point = distanceAndHash(history, null, createPathSet('missing'))
    expect(point.distance).toBe(5)
    expect(point.commit.abbreviatedHash).toBe('5555555')
  })

  it('reuses cached points for the same tag and path set', () => {
    let cache = createResolutionCache()
    let { history, calls } = createFakeHistory({
      touching: { chart: '3333333cc' },
      commits,
    })

    distanceAndHash(history, null, createPathSet('chart'), cache)
    distanceAndHash(history, null, createPathSet('./chart/'), cache)
    expect(calls).toEqual(['lastCommitTouching chart', 'countCommits ..3333333cc'])
  })
})
