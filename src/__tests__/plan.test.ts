import { describe, it, expect } from 'vitest'
import { planRelease } from '../core/release'
import { parseConfig } from '../core/config/load'

const config = parseConfig({
  engine: 'podman',
  registry: { server: 'registry.example.test' },
  targets: [{ image: 'acme/web' }, { image: 'acme/scheduler', dockerfile: 'Dockerfile.scheduler', context: 'services/scheduler' }],
  dispatch: {
    url: 'https://api.example.test/dispatches',
    username: 'acme-bot',
    environments: { qa: 'acme-qa', prod: 'acme-prod' }
  }
}, 'inline')

describe('planRelease', () => {
  it('lists every engine command in execution order', () => {
    const plan = planRelease(config, { tag: 'v1.2.3', isTaggedRelease: true }, 'ci-bot')
    expect(plan.commands).toEqual([
      'podman login --username ci-bot --password-stdin registry.example.test',
      'podman pull acme/web:latest',
      'podman build -t acme/web:latest -t acme/web:v1.2.3 -f Dockerfile --build-arg FROM_TAG=v1.2.3 --cache-from acme/web:latest .',
      'podman push acme/web:v1.2.3',
      'podman push acme/web:latest',
      'podman pull acme/scheduler:latest',
      'podman build -t acme/scheduler:latest -t acme/scheduler:v1.2.3 -f Dockerfile.scheduler --build-arg FROM_TAG=v1.2.3 --cache-from acme/scheduler:latest services/scheduler',
      'podman push acme/scheduler:v1.2.3',
      'podman push acme/scheduler:latest',
      'podman logout registry.example.test'
    ])
  })

  it('announces every target to the same environment', () => {
    const plan = planRelease(config, { tag: 'abc1234', isTaggedRelease: false }, 'ci-bot')
    expect(plan.environment).toBe('qa')
    expect(plan.notifications).toEqual([
      { url: 'https://api.example.test/dispatches', body: { event_type: 'deploy', client_payload: { environment: 'acme-qa', image: 'acme/web', tag: 'abc1234' } } },
      { url: 'https://api.example.test/dispatches', body: { event_type: 'deploy', client_payload: { environment: 'acme-qa', image: 'acme/scheduler', tag: 'abc1234' } } }
    ])
  })
})
