import { resolve } from 'node:path'
import { resolveConfig } from '../src/config'
import { extractMatchArmsFromFile } from '../src/extractor'

// Dev helper: read ./opcodes.rs and print one match arm per mnemonic, ready to paste
// into the CPU dispatch. Settings come from OPCODE_ARMS_* only; use src/cli.ts for flags.

export async function generate(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const config = resolveConfig({}, env)
  const { output } = await extractMatchArmsFromFile(resolve(cwd, config.input), config)
  return output
}

if (require.main === module) {
  generate()
    .then(output => process.stdout.write(output))
    .catch(e => {
      console.error(e)
      process.exit(1)
    })
}
