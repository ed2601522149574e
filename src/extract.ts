import { writeFile } from 'node:fs/promises'
import { basename, dirname, extname, join } from 'node:path'
import process from 'node:process'
import { extractFile } from './workflows.js'

async function main() {
  const args = process.argv.slice(2)
  const caseSensitive = args.includes('--case-sensitive')
  const positional = args.filter(arg => !arg.startsWith('--'))

  const [inputPath, explicitOutput] = positional
  if (!inputPath) {
    console.error('Usage: tsx src/extract.ts <input.svg> [output.json] [--case-sensitive]')
    process.exit(1)
  }

  const outputPath
    = explicitOutput ?? join(dirname(inputPath), `${basename(inputPath, extname(inputPath))}.json`)

  console.log(`📄 Extracting translations from: ${inputPath}`)

  const mapping = await extractFile(inputPath, { caseInsensitive: !caseSensitive })
  if (!mapping) {
    process.exit(1)
  }

  const texts = Object.keys(mapping.new ?? {}).length
  const titles = Object.keys(mapping.title ?? {}).length
  await writeFile(outputPath, JSON.stringify(mapping, null, 2))

  console.log(`\n✅ Extracted ${texts} texts (${titles} title templates)`)
  console.log(`📁 Output saved to: ${outputPath}`)
  console.log(`
📋 Next steps:
   Run: tsx src/inject.ts ${outputPath} <file.svg...>
`)
}

main().catch((err) => {
  console.error('Error:', err)
  process.exit(1)
})
