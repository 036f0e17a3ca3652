#!/usr/bin/env node
import { Command } from 'commander'
import { docsCommand } from './commands/docs.js'
import { frontmatterCommand } from './commands/frontmatter.js'
import { yamlCommand } from './commands/yaml.js'

const program = new Command()

program
  .name('docblocks')
  .description('Extract docs blocks and YAML frontmatter from project files')
  .version('0.1.0')

program
  .command('docs [path]')
  .description('Collect the docs blocks of a project into a registry')
  .option('--json', 'Output the registry as JSON')
  .action(async (path, options) => {
    const result = await docsCommand(path ?? '.', options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('frontmatter <file>')
  .description('Split a document into its YAML frontmatter and body')
  .option('--on-error <policy>', 'What to do with invalid frontmatter: ignore, warn_or_error', 'warn_or_error')
  .option('--warn-error', 'Treat warnings as errors')
  .action(async (file, options) => {
    const result = await frontmatterCommand(file, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('yaml <file>')
  .description('Decode a YAML file, reporting syntax errors with line context')
  .action(async (file) => {
    const result = await yamlCommand(file)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program.parse()
