import type { ProcessRunner, ExecResult } from '../../utils/process'
import type { Environment, ReleaseContext } from '../../types/release'

function firstLine(s: string): string {
  return s.split(/\r?\n/).map(l => l.trim()).find(l => l.length > 0) ?? ''
}

/**
 * Resolve the version for this run: an exact tag on HEAD marks a release,
 * otherwise `git describe --always --tags` names the commit.
 */
export async function resolveReleaseContext(runner: ProcessRunner, cwd: string): Promise<ReleaseContext> {
  const exact: ExecResult = await runner.exec('git', ['tag', '--points-at', 'HEAD'], { cwd })
  const releaseTag: string = exact.ok ? firstLine(exact.stdout) : ''
  if (releaseTag.length > 0) return Object.freeze({ tag: releaseTag, isTaggedRelease: true })
  const described: ExecResult = await runner.exec('git', ['describe', '--always', '--tags'], { cwd })
  const fallback: string = described.ok ? firstLine(described.stdout) : ''
  if (fallback.length === 0) {
    const reason = (described.stderr || exact.stderr).trim()
    throw new Error(`Cannot resolve a version from git in ${cwd}${reason ? `: ${reason}` : ''}`)
  }
  return Object.freeze({ tag: fallback, isTaggedRelease: false })
}

export function environmentFor(context: ReleaseContext): Environment {
  return context.isTaggedRelease ? 'prod' : 'qa'
}
