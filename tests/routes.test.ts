import pino from 'pino'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createApp } from '../src/app'
import db from '../src/lib/db'
import logger from '../src/lib/logger'
import { issues, outings } from '../src/db/schema'
import { UserService } from '../src/services/userService'
import {
  adminUser,
  authHeaders,
  createIssue,
  createLine,
  createOuting,
  createTeamMember,
  editorUser,
  resetDatabase,
  viewerUser,
} from './helpers'

describe('HTTP API', () => {
  let app: ReturnType<typeof createApp>

  beforeEach(async () => {
    resetDatabase()
    app = createApp()
    await app.ready()
  })

  afterEach(async () => {
    await app.close()
  })

  it('serves the health check without a token', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' })
    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({ status: 'ok' })
  })

  it('logs requests through the shared service logger', () => {
    expect(Reflect.get(app.log, pino.symbols.streamSym)).toBe(Reflect.get(logger, pino.symbols.streamSym))
  })

  it('requires a valid bearer token', async () => {
    expect((await app.inject({ method: 'GET', url: '/api/lines' })).statusCode).toBe(401)
    expect(
      (await app.inject({ method: 'GET', url: '/api/lines', headers: { authorization: 'Bearer not-a-token' } })).statusCode,
    ).toBe(401)
  })

  describe('lines', () => {
    it('creates and lists lines with display labels and counts', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/api/lines',
        headers: authHeaders(editorUser),
        payload: { name: 'Ridge', lineType: 'MouseLine', startStationId: '1', endStationId: '20' },
      })
      expect(created.statusCode).toBe(201)
      const { line } = created.json()
      expect(line).toEqual({
        id: line.id,
        name: 'Ridge',
        displayName: 'Ridge (Mouse-Line)',
        lineType: 'MouseLine',
        lineTypeLabel: 'Mouse-Line',
        startStationId: '1',
        endStationId: '20',
      })

      createOuting({ lineId: line.id, date: '2024-05-01' })
      createOuting({ lineId: line.id, date: '2024-05-02', completionStatus: 'Partial' })

      const listed = await app.inject({ method: 'GET', url: '/api/lines', headers: authHeaders(viewerUser) })
      expect(listed.statusCode).toBe(200)
      expect(listed.json()).toEqual({
        items: [{ ...line, outingCount: 2, completedOutingCount: 1, issueCount: 0 }],
        pagination: { total: 1, limit: 50, offset: 0, hasMore: false },
      })
    })

    it('counts outings and issues per line and orders by them', async () => {
      const ridge = createLine({ name: 'Ridge' })
      const creek = createLine({ name: 'Creek' })
      createOuting({ lineId: ridge.id, date: '2024-05-01' })
      createOuting({ lineId: ridge.id, date: '2024-05-02', completionStatus: 'Partial' })
      createOuting({ lineId: ridge.id, date: '2024-05-03', completionStatus: 'Partial' })
      createOuting({ lineId: creek.id, date: '2024-05-01' })
      createIssue({ lineId: creek.id })

      const response = await app.inject({
        method: 'GET',
        url: '/api/lines?ordering=-outingCount',
        headers: authHeaders(viewerUser),
      })

      const items: Array<{ name: string; outingCount: number; completedOutingCount: number; issueCount: number }> =
        response.json().items
      expect(items.map(({ name, outingCount, completedOutingCount, issueCount }) => ({
        name,
        outingCount,
        completedOutingCount,
        issueCount,
      }))).toEqual([
        { name: 'Ridge', outingCount: 3, completedOutingCount: 1, issueCount: 0 },
        { name: 'Creek', outingCount: 1, completedOutingCount: 1, issueCount: 1 },
      ])
    })

    it('deletes a line together with its outings and issues', async () => {
      const line = createLine({ name: 'Ridge' })
      const outing = createOuting({ lineId: line.id, date: '2024-05-01' })
      createIssue({ lineId: line.id, outingId: outing.id })
      createIssue({ lineId: line.id })

      const response = await app.inject({ method: 'DELETE', url: `/api/lines/${line.id}`, headers: authHeaders(editorUser) })

      expect(response.statusCode).toBe(204)
      expect(db.select().from(outings).all()).toHaveLength(0)
      expect(db.select().from(issues).all()).toHaveLength(0)
    })

    it('rejects viewers, unknown line types and inverted ranges', async () => {
      const payload = { name: 'Ridge', lineType: 'Transect', startStationId: '1', endStationId: '20' }

      const asViewer = await app.inject({ method: 'POST', url: '/api/lines', headers: authHeaders(viewerUser), payload })
      expect(asViewer.statusCode).toBe(403)

      const badType = await app.inject({
        method: 'POST',
        url: '/api/lines',
        headers: authHeaders(editorUser),
        payload: { ...payload, lineType: 'Loop' },
      })
      expect(badType.statusCode).toBe(400)

      const inverted = await app.inject({
        method: 'POST',
        url: '/api/lines',
        headers: authHeaders(editorUser),
        payload: { ...payload, startStationId: '30' },
      })
      expect(inverted.statusCode).toBe(400)
      expect(inverted.json().message).toBe('The start station must not come after the end station.')
    })

    it('exports the completion report as CSV', async () => {
      const alpha = createLine({ name: 'Alpha' })
      createLine({ name: 'Bravo', lineType: 'MouseLine' })
      createOuting({ lineId: alpha.id, date: '2024-03-05' })
      createOuting({ lineId: alpha.id, date: '2024-02-01', completionStatus: 'Partial' })
      createIssue({ lineId: alpha.id })

      const response = await app.inject({
        method: 'GET',
        url: '/api/lines/completion-report?format=csv',
        headers: authHeaders(viewerUser),
      })

      expect(response.statusCode).toBe(200)
      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8')
      expect(response.headers['content-disposition']).toBe('attachment; filename="completion_report.csv"')
      expect(response.body.split('\n')).toEqual([
        'Line Name,Type,Last Completed,Last Partial,Completed Count,Partial Count,Unresolved Issues,Total Issues',
        'Alpha,Transect,2024-03-05,2024-02-01,1,1,1,1',
        'Bravo,Mouse-Line,Never,Never,0,0,0,0',
      ])
    })

    it('returns the completion report as JSON with the sort echoed', async () => {
      createLine({ name: 'Alpha' })

      const response = await app.inject({
        method: 'GET',
        url: '/api/lines/completion-report?sort=line_name&order=asc',
        headers: authHeaders(viewerUser),
      })

      const report = response.json()
      expect(report.title).toBe('Line Completion Report')
      expect(report.sortBy).toBe('line_name')
      expect(report.sortOrder).toBe('asc')
      expect(report.rows[0].lastCompleted).toBeNull()
      expect(report.rows[0].line.name).toBe('Alpha')
    })
  })

  describe('outings', () => {
    it('creates an outing with participants and an inline issue', async () => {
      const line = createLine({ name: 'Ridge', startStationId: '1', endStationId: '20' })
      const member = createTeamMember('AB', false)

      const created = await app.inject({
        method: 'POST',
        url: '/api/outings',
        headers: authHeaders(editorUser),
        payload: { date: '2024-05-01', lineId: line.id, hours: 3.456, startStationId: '2', participantIds: [member.id] },
      })
      expect(created.statusCode).toBe(201)
      const { outing } = created.json()
      expect(outing).toMatchObject({
        displayName: 'Outing on 2024-05-01 - Completed',
        hours: 3.46,
        numberOfWorkers: 1,
        completionStatusLabel: 'Completed',
        startStationId: '2',
        endStationId: null,
        issues: [],
      })
      expect(outing.participants).toEqual([
        { id: member.id, name: 'AB', displayName: '[AB]', available: false, emailAddress: null },
      ])

      const issue = await app.inject({
        method: 'POST',
        url: `/api/outings/${outing.id}/issues`,
        headers: authHeaders(editorUser),
        payload: { startStationId: '4', issueType: 'NeedsRope' },
      })
      expect(issue.statusCode).toBe(201)
      expect(issue.json().issue).toMatchObject({
        displayName: 'Issue at 4: Needs Rope',
        lineId: line.id,
        outingId: outing.id,
        issueStatus: 'NeedsWork',
        issueStatusLabel: 'Needs Work',
        stationType: 'NA',
        stationTypeLabel: 'N/A',
        issueTypeLabel: 'Needs Rope',
      })

      const detail = await app.inject({ method: 'GET', url: `/api/outings/${outing.id}`, headers: authHeaders(viewerUser) })
      expect(detail.json().outing.issues).toHaveLength(1)
    })

    it('deletes an outing together with its issues', async () => {
      const line = createLine({ name: 'Ridge' })
      const outing = createOuting({ lineId: line.id, date: '2024-05-01' })
      createIssue({ lineId: line.id, outingId: outing.id })
      const standalone = createIssue({ lineId: line.id })

      const response = await app.inject({
        method: 'DELETE',
        url: `/api/outings/${outing.id}`,
        headers: authHeaders(editorUser),
      })

      expect(response.statusCode).toBe(204)
      expect(db.select().from(issues).all().map((issue) => issue.id)).toEqual([standalone.id])
    })

    it('rejects stations outside the line and unknown outings', async () => {
      const line = createLine({ name: 'Ridge', startStationId: '1', endStationId: '20' })

      const outside = await app.inject({
        method: 'POST',
        url: '/api/outings',
        headers: authHeaders(editorUser),
        payload: { date: '2024-05-01', lineId: line.id, hours: 1, startStationId: '5', endStationId: '25' },
      })
      expect(outside.statusCode).toBe(400)

      const missing = await app.inject({ method: 'GET', url: '/api/outings/999999', headers: authHeaders(viewerUser) })
      expect(missing.statusCode).toBe(404)
      expect(missing.json().message).toBe('Outing not found')
    })
  })

  describe('team members', () => {
    it('imports CSV, lists available members first and exports TSV', async () => {
      const imported = await app.inject({
        method: 'POST',
        url: '/api/team-members/import',
        headers: { ...authHeaders(editorUser), 'content-type': 'text/csv' },
        payload: 'name,available,email_address\nCD,0,cd@example.org\nAB,1,',
      })
      expect(imported.statusCode).toBe(200)
      expect(imported.json()).toMatchObject({ resource: 'team-members', committed: true, totals: { new: 2, update: 0, error: 0 } })

      const listed = await app.inject({ method: 'GET', url: '/api/team-members', headers: authHeaders(viewerUser) })
      const items: Array<{ id: number; displayName: string }> = listed.json().items
      expect(items.map((item) => item.displayName)).toEqual(['AB', '[CD]'])

      const exported = await app.inject({
        method: 'GET',
        url: '/api/team-members/export?format=tsv',
        headers: authHeaders(viewerUser),
      })
      expect(exported.headers['content-type']).toBe('text/tab-separated-values; charset=utf-8')
      expect(exported.headers['content-disposition']).toBe('attachment; filename="team-members.tsv"')
      expect(exported.body.split('\n')).toEqual([
        'id\tname\tavailable\temail_address',
        `${items[0].id}\tAB\t1\t`,
        `${items[1].id}\tCD\t0\tcd@example.org`,
      ])
    })

    it('refuses an import body that is not delimited text', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/team-members/import',
        headers: authHeaders(editorUser),
        payload: { name: 'AB' },
      })
      expect(response.statusCode).toBe(415)
    })
  })

  describe('auth and audits', () => {
    beforeEach(async () => {
      await UserService.create({ username: 'ranger', password: 'test-password', roles: ['EDITOR'] })
    })

    it('records logins and logouts in the audit log', async () => {
      const failed = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { username: 'ranger', password: 'wrong-password' },
      })
      expect(failed.statusCode).toBe(401)

      const login = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { username: 'ranger', password: 'test-password' },
      })
      expect(login.statusCode).toBe(200)
      const { token, user } = login.json()
      expect(user).toMatchObject({ username: 'ranger', roles: ['EDITOR'] })

      const logout = await app.inject({
        method: 'POST',
        url: '/api/auth/logout',
        headers: { authorization: `Bearer ${token}` },
      })
      expect(logout.statusCode).toBe(204)

      const audits = await app.inject({ method: 'GET', url: '/api/audits', headers: authHeaders(adminUser) })
      expect(audits.statusCode).toBe(200)
      const items: Array<{ action: string; actionLabel: string; ip: string | null; username: string | null }> =
        audits.json().items
      expect(items.map(({ action, actionLabel, ip, username }) => ({ action, actionLabel, ip, username }))).toEqual([
        { action: 'Logout', actionLabel: 'Logout', ip: '127.0.0.1', username: 'ranger' },
        { action: 'Login', actionLabel: 'Login', ip: '127.0.0.1', username: 'ranger' },
        { action: 'LoginFailed', actionLabel: 'Login Failed', ip: '127.0.0.1', username: 'ranger' },
      ])
    })

    it('keeps the audit log admin-only and read-only', async () => {
      expect((await app.inject({ method: 'GET', url: '/api/audits', headers: authHeaders(editorUser) })).statusCode).toBe(403)
      expect((await app.inject({ method: 'DELETE', url: '/api/audits/1', headers: authHeaders(adminUser) })).statusCode).toBe(
        405,
      )
      expect(
        (await app.inject({ method: 'POST', url: '/api/audits', headers: authHeaders(adminUser), payload: {} })).statusCode,
      ).toBe(405)
    })
  })
})
