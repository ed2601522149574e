import process from 'node:process'
import { startInjects } from './batch.js'
import { loadAllMappings } from './mappings.js'

const USAGE = 'Usage: tsx src/inject.ts <mapping.json> <file.svg...> '
  + '[--out-dir dir] [--concurrency n] [--overwrite] [--case-sensitive]'

interface CliArgs {
  mappingPath: string
  files: string[]
  outputDir?: string
  concurrency?: number
  overwrite: boolean
  caseSensitive: boolean
}

function parseArgs(args: string[]): CliArgs | undefined {
  const positional: string[] = []
  let outputDir: string | undefined
  let concurrency: number | undefined
  let overwrite = false
  let caseSensitive = false

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--overwrite') {
      overwrite = true
    }
    else if (arg === '--case-sensitive') {
      caseSensitive = true
    }
    else if (arg === '--out-dir') {
      outputDir = args[++i]
    }
    else if (arg === '--concurrency') {
      concurrency = Number(args[++i])
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        return undefined
      }
    }
    else if (arg !== undefined) {
      positional.push(arg)
    }
  }

  const [mappingPath, ...files] = positional
  if (!mappingPath || files.length === 0) {
    return undefined
  }
  return { mappingPath, files, outputDir, concurrency, overwrite, caseSensitive }
}

async function main() {
  const args = parseArgs(process.argv.slice(2))
  if (!args) {
    console.error(USAGE)
    process.exit(1)
  }

  console.log(`📝 Mapping: ${args.mappingPath}`)
  const mapping = await loadAllMappings([args.mappingPath])
  console.log(`📖 Loaded ${Object.keys(mapping.new ?? {}).length} texts`)

  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())

  const result = await startInjects(args.files, mapping, {
    outputDir: args.outputDir,
    concurrency: args.concurrency,
    overwrite: args.overwrite,
    caseInsensitive: !args.caseSensitive,
    signal: controller.signal,
  })

  for (const [path, file] of Object.entries(result.files)) {
    const detail = file.status === 'error' ? file.error : `+${file.stats.insertedTranslations}`
    console.log(`  - ${path}: ${file.status} (${detail})`)
  }

  const { totals } = result
  console.log(`\n✅ Injection complete!`)
  console.log(
    `📊 ${totals.insertedTranslations} inserted, ${totals.updatedTranslations} updated, `
    + `${totals.skippedTranslations} skipped, ${totals.newLanguages} new languages`,
  )
}

main().catch((err) => {
  console.error('Error:', err)
  process.exit(1)
})
