import * as p from '@clack/prompts'

import { GPU_RAM_THRESHOLD_MB, RECOMMENDED_MODELS } from './provision.js'

export function shouldConfirm(assumeYes: boolean, isTTY: boolean): boolean {
  return !assumeYes && isTTY
}

/**
 * Ask before touching the system. Resolves false when the operator declines
 * or cancels.
 */
export async function confirmInstall(): Promise<boolean> {
  p.intro('Ollama setup')
  p.note(
    [
      'apt-get update && apt-get install -y curl',
      'Ollama official installer',
      'systemctl start/enable ollama',
      `ollama pull ${RECOMMENDED_MODELS.join(', ')} (GPU RAM >= ${GPU_RAM_THRESHOLD_MB} MB)`,
    ].join('\n'),
    'This will run'
  )

  const proceed = await p.confirm({
    message: 'Continue? sudo will ask for your password.',
    initialValue: true,
  })

  if (p.isCancel(proceed) || !proceed) {
    p.cancel('Setup cancelled.')
    return false
  }

  p.outro('Starting installation...')
  return true
}
