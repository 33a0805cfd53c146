#!/usr/bin/env tsx
import 'dotenv/config'
import process from 'node:process'
import { parseBriefInput } from '../src/lib/brief.js'
import { loadLlmConfig } from '../src/lib/config.js'
import { createChat } from '../src/lib/openai.js'
import { runCreativeChain } from '../src/lib/chain/run.js'
import { errorMessage } from '../src/lib/errors.js'

function parseArgs(argv: string[]) {
  const out: Record<string, string> = {}
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token.startsWith('--')) {
      const key = token.slice(2)
      const value = argv[i + 1]
      if (value !== undefined && !value.startsWith('--')) {
        out[key] = value
        i += 1
      } else {
        out[key] = ''
      }
    }
  }
  return out
}

async function main() {
  const args = parseArgs(process.argv.slice(2))
  if (!args.product && !args.description) {
    console.error('Usage: npm run chain -- --product "..." [--description "..."] [--audience "..."] [--tone "..."] [--language English|Arabic]')
    process.exit(1)
  }

  const input = parseBriefInput({
    product: args.product,
    description: args.description,
    audience: args.audience,
    tone: args.tone,
    language: args.language || undefined,
  })
  const chat = createChat(loadLlmConfig())

  const result = await runCreativeChain(input, {
    chat,
    onProgress: (p) => {
      if (p.status === 'start') console.error(`[${p.index + 1}/${p.total}] ${p.label}`)
    },
  })
  process.stdout.write(result.markdown + '\n')
}

main().catch((err) => {
  console.error(`Generation failed: ${errorMessage(err)}`)
  process.exit(1)
})
