import { mkdtemp, readdir } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { ConversationLog, conversationFileName } from '../swarm/conversation-log.js'
import { NotFoundError, ValidationError } from '../swarm/errors.js'
import type { ConversationTurn } from '../swarm/types.js'

async function createLog(maxTurns?: number) {
  const dataDir = await mkdtemp(join(tmpdir(), 'handoff-relay-conversations-test-'))
  const conversationsDir = join(dataDir, 'conversations')
  const log = new ConversationLog({
    config: { maxTurns, paths: { dataDir, agentsDir: join(dataDir, 'agents'), conversationsDir } },
    logDebug: () => {},
    now: () => '2026-01-01T00:00:00.000Z',
  })
  await log.ensureDirectories()
  return { log, conversationsDir }
}

function userTurn(text: string, agent = 'Risk_Analyst'): ConversationTurn {
  return { role: 'user', agent, text, timestamp: '2026-01-01T00:00:00.000Z' }
}

describe('ConversationLog', () => {
  it('creates a conversation on ensure and returns the same record afterwards', async () => {
    const { log } = await createLog()

    const created = await log.ensure('c1', 'Risk_Analyst')
    const again = await log.ensure('c1', 'Portfolio_Manager')

    expect(created).toEqual({
      conversationId: 'c1',
      activeAgent: 'Risk_Analyst',
      turns: [],
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    })
    expect(again.activeAgent).toBe('Risk_Analyst')
  })

  it('appends turns in order', async () => {
    const { log } = await createLog()
    await log.ensure('c1', 'Risk_Analyst')

    await log.append('c1', userTurn('first'))
    await log.append('c1', { ...userTurn('second'), role: 'agent', handoffTo: 'Portfolio_Manager' })

    const turns = await log.history('c1')
    expect(turns.map((turn) => turn.text)).toEqual(['first', 'second'])
    expect(turns[1].handoffTo).toBe('Portfolio_Manager')
  })

  it('keeps only the newest turns when maxTurns is set', async () => {
    const { log } = await createLog(2)
    await log.ensure('c1', 'Risk_Analyst')

    for (const text of ['one', 'two', 'three']) {
      await log.append('c1', userTurn(text))
    }

    expect((await log.history('c1')).map((turn) => turn.text)).toEqual(['two', 'three'])
  })

  it('resets turns but keeps the conversation and its active agent', async () => {
    const { log } = await createLog()
    await log.ensure('c1', 'Risk_Analyst')
    await log.append('c1', userTurn('hello'))
    await log.setActiveAgent('c1', 'Portfolio_Manager')

    const reset = await log.reset('c1')

    expect(reset.turns).toEqual([])
    expect(reset.activeAgent).toBe('Portfolio_Manager')
    expect(await log.history('c1')).toEqual([])
  })

  it('reports unknown conversations as not found', async () => {
    const { log } = await createLog()

    expect(await log.get('missing')).toBeUndefined()
    await expect(log.history('missing')).rejects.toBeInstanceOf(NotFoundError)
    await expect(log.reset('missing')).rejects.toThrow('Conversation "missing" not found')
    await expect(log.append('missing', userTurn('x'))).rejects.toBeInstanceOf(NotFoundError)
  })

  it('keeps conversations with similar ids apart', async () => {
    const { log, conversationsDir } = await createLog()
    await log.ensure('Deal Review', 'Risk_Analyst')
    await log.ensure('deal-review', 'Data_Analyst')

    expect((await log.get('Deal Review'))?.activeAgent).toBe('Risk_Analyst')
    expect((await log.get('deal-review'))?.activeAgent).toBe('Data_Analyst')
    expect(await readdir(conversationsDir)).toHaveLength(2)
  })
})

describe('conversationFileName', () => {
  it('builds a readable slug with a hash suffix', () => {
    expect(conversationFileName('Deal Review')).toMatch(/^deal-review-[0-9a-f]{8}\.json$/)
    expect(conversationFileName('???')).toMatch(/^conversation-[0-9a-f]{8}\.json$/)
    expect(conversationFileName(' c1 ')).toBe(conversationFileName('c1'))
  })

  it('rejects blank ids', () => {
    expect(() => conversationFileName('  ')).toThrow(ValidationError)
  })
})
