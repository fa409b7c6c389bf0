#!/usr/bin/env node
/**
 * CLI entry for rxv — submit URLs to web archives.
 *
 * Usage:
 *   npm run rxv -- https://example.com --at --ia
 *   echo https://example.com | npm run rxv -- --all
 *   npm run rxv -- --list
 */

import 'dotenv/config'

import { runCommand, type CommandIo } from './core/command.js'

async function readStdin(): Promise<string> {
  // Nothing piped in: don't wait on the terminal
  if (process.stdin.isTTY) return ''

  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

const io: CommandIo = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
  readStdin,
}

async function main() {
  const code = await runCommand(process.argv.slice(2), {
    io,
    fetch: (url, init) => fetch(url, init),
    env: process.env,
  })
  process.exit(code)
}

main().catch(err => {
  console.error('Fatal error:', err)
  process.exit(1)
})
