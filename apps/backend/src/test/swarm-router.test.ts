import { mkdtemp } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { AgentStore } from '../swarm/agent-store.js'
import { ConversationLog } from '../swarm/conversation-log.js'
import { NotFoundError, RateLimitError, UpstreamError, ValidationError } from '../swarm/errors.js'
import { SwarmRouter } from '../swarm/swarm-router.js'
import type { CompletionRequest, InferenceClient, ModelResponse } from '../swarm/types.js'

type Script = (request: CompletionRequest) => ModelResponse | Promise<ModelResponse>

class FakeInference implements InferenceClient {
  readonly requests: CompletionRequest[] = []

  constructor(private readonly script: Script) {}

  async complete(request: CompletionRequest): Promise<ModelResponse> {
    this.requests.push(request)
    return this.script(request)
  }
}

async function createRouter(script: Script, options: { maxHops?: number } = {}) {
  const dataDir = await mkdtemp(join(tmpdir(), 'handoff-relay-router-test-'))
  const paths = { dataDir, agentsDir: join(dataDir, 'agents'), conversationsDir: join(dataDir, 'conversations') }
  const logDebug = () => {}

  const agents = new AgentStore({
    config: { defaultModel: { provider: 'anthropic', modelId: 'claude-sonnet-4-20250514' }, paths },
    logDebug,
  })
  const conversations = new ConversationLog({ config: { paths }, logDebug })
  const inference = new FakeInference(script)
  const router = new SwarmRouter({
    config: { maxHops: options.maxHops ?? 5, defaultConversationId: 'default' },
    agents,
    conversations,
    inference,
    logDebug,
    now: () => '2026-01-01T00:00:00.000Z',
  })

  await agents.create({ name: 'Risk_Analyst', instructions: 'You assess risk.' })
  await agents.create({ name: 'Portfolio_Manager', instructions: 'You manage portfolios.' })

  return { router, agents, conversations, inference }
}

describe('SwarmRouter', () => {
  it('returns the addressed agent\'s reply when no handoff is requested', async () => {
    const { router, conversations, inference } = await createRouter(() => ({ content: 'Risk looks moderate.' }))

    const result = await router.chat({ message: '  Assess my risk  ', agentName: 'Risk_Analyst', conversationId: 'c1' })

    expect(result).toEqual({
      conversationId: 'c1',
      response: 'Risk looks moderate.',
      startingAgent: 'Risk_Analyst',
      respondingAgent: 'Risk_Analyst',
      activeAgent: 'Risk_Analyst',
      hops: 1,
      handoffs: [],
      truncated: false,
    })
    expect(inference.requests[0].history.map((turn) => turn.text)).toEqual(['Assess my risk'])
    expect(inference.requests[0].handoffTools.map((tool) => tool.name)).toEqual(['transfer_to_portfolio_manager'])
    expect(await conversations.history('c1')).toEqual([
      { role: 'user', agent: 'Risk_Analyst', text: 'Assess my risk', timestamp: '2026-01-01T00:00:00.000Z' },
      { role: 'agent', agent: 'Risk_Analyst', text: 'Risk looks moderate.', timestamp: '2026-01-01T00:00:00.000Z' },
    ])
  })

  it('follows a handoff and keeps the target active for the next message', async () => {
    const { router, conversations, inference } = await createRouter((request) =>
      request.agent.name === 'Risk_Analyst'
        ? { content: 'Your allocation is aggressive.', handoff: 'Portfolio_Manager' }
        : { content: 'Rebalance toward bonds.' },
    )

    const first = await router.chat({ message: 'Assess my risk', agentName: 'Risk_Analyst', conversationId: 'c1' })

    expect(first.response).toBe('Rebalance toward bonds.')
    expect(first.respondingAgent).toBe('Portfolio_Manager')
    expect(first.activeAgent).toBe('Portfolio_Manager')
    expect(first.hops).toBe(2)
    expect(first.handoffs).toEqual([{ from: 'Risk_Analyst', to: 'Portfolio_Manager' }])
    expect(inference.requests[1].history.map((turn) => turn.text)).toEqual([
      'Assess my risk',
      'Your allocation is aggressive.',
    ])

    const second = await router.chat({ message: 'What should I buy?', conversationId: 'c1' })

    expect(second.startingAgent).toBe('Portfolio_Manager')
    expect(second.hops).toBe(1)
    const turns = await conversations.history('c1')
    expect(turns.map((turn) => [turn.role, turn.agent, turn.handoffTo])).toEqual([
      ['user', 'Risk_Analyst', undefined],
      ['agent', 'Risk_Analyst', 'Portfolio_Manager'],
      ['agent', 'Portfolio_Manager', undefined],
      ['user', 'Portfolio_Manager', undefined],
      ['agent', 'Portfolio_Manager', undefined],
    ])
  })

  it('stops at the hop limit and leaves the pending target active', async () => {
    const { router, conversations } = await createRouter(
      (request) => ({
        content: `${request.agent.name} passes`,
        handoff: request.agent.name === 'Risk_Analyst' ? 'Portfolio_Manager' : 'Risk_Analyst',
      }),
      { maxHops: 3 },
    )

    const result = await router.chat({ message: 'Loop', agentName: 'Risk_Analyst', conversationId: 'c1' })

    expect(result.truncated).toBe(true)
    expect(result.hops).toBe(3)
    expect(result.respondingAgent).toBe('Risk_Analyst')
    expect(result.response).toBe('Risk_Analyst passes')
    expect(result.activeAgent).toBe('Portfolio_Manager')
    expect(result.handoffs).toHaveLength(3)
    expect(await conversations.history('c1')).toHaveLength(4)
    expect((await conversations.get('c1'))?.activeAgent).toBe('Portfolio_Manager')
  })

  it('records handoffs to unknown agents or to itself as rejected', async () => {
    const targets = ['Ghost', 'Risk_Analyst']
    const { router, conversations } = await createRouter((request) => ({
      content: `reply ${request.history.length}`,
      handoff: targets.shift(),
    }))

    const unknown = await router.chat({ message: 'one', agentName: 'Risk_Analyst', conversationId: 'c1' })
    const self = await router.chat({ message: 'two', conversationId: 'c1' })

    expect(unknown.hops).toBe(1)
    expect(unknown.handoffs).toEqual([])
    expect(unknown.activeAgent).toBe('Risk_Analyst')
    expect(self.hops).toBe(1)

    const agentTurns = (await conversations.history('c1')).filter((turn) => turn.role === 'agent')
    expect(agentTurns.map((turn) => turn.rejectedHandoff)).toEqual(['Ghost', 'Risk_Analyst'])
    expect(agentTurns.map((turn) => turn.handoffTo)).toEqual([undefined, undefined])
  })

  it('rejects handoffs outside the agent\'s declared transfer tools', async () => {
    const { router, agents, conversations, inference } = await createRouter((request) =>
      request.agent.name === 'Gatekeeper'
        ? { content: 'Sending you to compliance.', handoff: 'Compliance' }
        : { content: 'unexpected' },
    )
    await agents.create({
      name: 'Gatekeeper',
      instructions: 'You only hand off to the risk desk.',
      tools: ['transfer_to_risk_analyst'],
    })
    await agents.create({ name: 'Compliance', instructions: 'You review compliance.' })

    const result = await router.chat({ message: 'Route me', agentName: 'Gatekeeper', conversationId: 'c1' })

    expect(inference.requests[0].handoffTools.map((tool) => tool.name)).toEqual(['transfer_to_risk_analyst'])
    expect(result.respondingAgent).toBe('Gatekeeper')
    expect(result.activeAgent).toBe('Gatekeeper')
    expect(result.handoffs).toEqual([])
    expect(result.hops).toBe(1)
    const turns = await conversations.history('c1')
    expect(turns[1].rejectedHandoff).toBe('Compliance')
    expect(turns[1].handoffTo).toBeUndefined()
  })

  it('uses the default conversation when no id is given', async () => {
    const { router, conversations } = await createRouter(() => ({ content: 'ok' }))

    const result = await router.chat({ message: 'hi', agentName: 'Risk_Analyst', conversationId: '  ' })

    expect(result.conversationId).toBe('default')
    expect(await conversations.history('default')).toHaveLength(2)
  })

  it('requires an agent name to start a conversation', async () => {
    const { router, conversations, inference } = await createRouter(() => ({ content: 'ok' }))

    await expect(router.chat({ message: 'hi', conversationId: 'new' })).rejects.toThrow(
      'agentName is required to start a new conversation',
    )
    await expect(router.chat({ message: 'hi', agentName: 'Ghost', conversationId: 'new' })).rejects.toBeInstanceOf(
      NotFoundError,
    )
    await expect(router.chat({ message: '   ', agentName: 'Risk_Analyst' })).rejects.toBeInstanceOf(ValidationError)
    expect(await conversations.get('new')).toBeUndefined()
    expect(inference.requests).toHaveLength(0)
  })

  it('keeps completed hops when a later hop fails', async () => {
    const { router, conversations } = await createRouter((request) => {
      if (request.agent.name === 'Portfolio_Manager') {
        throw new RateLimitError('Provider is throttling requests: 429')
      }
      return { content: 'Handing over.', handoff: 'Portfolio_Manager' }
    })

    await expect(
      router.chat({ message: 'Assess', agentName: 'Risk_Analyst', conversationId: 'c1' }),
    ).rejects.toBeInstanceOf(RateLimitError)

    const record = await conversations.get('c1')
    expect(record?.turns.map((turn) => turn.text)).toEqual(['Assess', 'Handing over.'])
    expect(record?.activeAgent).toBe('Portfolio_Manager')
  })

  it('stops between hops when the request is cancelled', async () => {
    const controller = new AbortController()
    const { router, inference } = await createRouter(() => {
      controller.abort()
      return { content: 'Handing over.', handoff: 'Portfolio_Manager' }
    })

    const chat = router.chat({
      message: 'Assess',
      agentName: 'Risk_Analyst',
      conversationId: 'c1',
      signal: controller.signal,
    })

    await expect(chat).rejects.toBeInstanceOf(UpstreamError)
    await expect(chat).rejects.toThrow('Request cancelled after 1 model calls')
    expect(inference.requests).toHaveLength(1)
  })

  it('serializes concurrent messages to the same conversation', async () => {
    const { router, conversations } = await createRouter(async (request) => {
      await new Promise((resolve) => setTimeout(resolve, 5))
      const last = request.history[request.history.length - 1]
      return { content: `reply:${last.text}` }
    })

    await Promise.all([
      router.chat({ message: 'first', agentName: 'Risk_Analyst', conversationId: 'c1' }),
      router.chat({ message: 'second', agentName: 'Risk_Analyst', conversationId: 'c1' }),
    ])

    expect((await conversations.history('c1')).map((turn) => turn.text)).toEqual([
      'first',
      'reply:first',
      'second',
      'reply:second',
    ])
  })

  it('returns and resets history through the router', async () => {
    const { router } = await createRouter((request) =>
      request.agent.name === 'Risk_Analyst' ? { content: 'over', handoff: 'Portfolio_Manager' } : { content: 'done' },
    )
    await router.chat({ message: 'hi', agentName: 'Risk_Analyst', conversationId: 'c1' })

    const history = await router.history('c1')
    const reset = await router.reset('c1')

    expect(history.turns).toHaveLength(3)
    expect(reset).toEqual({ conversationId: 'c1', activeAgent: 'Portfolio_Manager', turns: [] })
    await expect(router.history('missing')).rejects.toBeInstanceOf(NotFoundError)
  })
})
