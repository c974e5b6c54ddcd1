#!/usr/bin/env node
// TempleCode command-line front-end and REPL.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import path from 'path'
import * as readline from 'readline'

import {ArgumentParser, RawDescriptionHelpFormatter} from 'argparse'
import envPaths from 'env-paths'
import fs, {type PathOrFileDescriptor} from 'fs-extra'
import tildify from 'tildify'

import programVersion from './version.js'
import type {InputProvider} from './templecode/collaborators.js'
import {Interpreter} from './templecode/interpreter.js'
import {bracketBalance} from './templecode/program.js'
import {FileSlotStore, defaultSlotDirectory} from './templecode/slots.js'
import {debug} from './templecode/util.js'

if (process.env.DEBUG) {
  Error.stackTraceLimit = Infinity
}

const historyFile = process.env.TEMPLECODE_HISTORY
  ?? path.join(envPaths('templecode', {suffix: ''}).config, 'history')

// Read and process arguments
const parser = new ArgumentParser({
  description: 'TempleCode: PILOT, BASIC and Logo in one language.',
  formatter_class: RawDescriptionHelpFormatter,
  epilog: `\`-' given as a file name means standard input.

If just one non-option argument is given, TempleCode treats it as a FILE to
be \`run'.

Save slots are stored in the directory given by the environment variable
TEMPLECODE_SAVES (default: ${tildify(defaultSlotDirectory())})

Command line history is saved to the file given by the environment variable
TEMPLECODE_HISTORY (default: ${tildify(historyFile)})`,
})
parser.add_argument('--version', {
  action: 'version',
  version: `%(prog)s ${programVersion}
Distributed under the GNU General Public License version 3, or (at
your option) any later version. There is no warranty.`,
})
parser.add_argument('--max-iterations', {
  dest: 'maxIterations',
  metavar: 'N',
  type: 'int',
  default: 10000,
  help: 'stop a program after N commands [default: 10000]',
})
parser.add_argument('--saves', {metavar: 'DIRECTORY', help: 'directory for save slots'})

const subparsers = parser.add_subparsers({description: 'action to take'})

function addExecArgs(parser: ArgumentParser) {
  parser.add_argument('--turtle', '-t', {metavar: 'FILE', help: 'write the final turtle state as JSON to FILE'})
  parser.add_argument('--interactive', '-i', {action: 'store_true', help: 'enter interactive mode after running given code'})
}

const commandNames = new Set(['run', 'r', 'eval', 'e', 'interact', 'i', 'repl'])

const runParser = subparsers.add_parser('run', {aliases: ['r'], description: 'Run TempleCode program'})
runParser.set_defaults({func: runCommand})
runParser.add_argument('source', {metavar: 'FILE', help: 'TempleCode program to run'})
addExecArgs(runParser)

const evalParser = subparsers.add_parser('eval', {aliases: ['e'], description: 'Run TempleCode given on the command line'})
evalParser.set_defaults({func: evalCommand})
evalParser.add_argument('source', {metavar: 'CODE', help: 'TempleCode to run'})
addExecArgs(evalParser)

const interactParser = subparsers.add_parser('interact', {aliases: ['i', 'repl'], description: 'Run in interactive mode'})
interactParser.set_defaults({func: interactCommand})

interface Args {
  func?: (args: Args) => Promise<void>
  maxIterations: number
  saves: string | undefined

  // Run/eval arguments
  source: string
  turtle: string | undefined
  interactive: boolean
}

// Read lines from standard input without giving up control.
class StdinInput implements InputProvider {
  readLine(prompt: string) {
    process.stdout.write(prompt)
    const bytes: number[] = []
    const buffer = Buffer.alloc(1)
    for (;;) {
      let n: number
      try {
        n = fs.readSync(process.stdin.fd, buffer, 0, 1, null)
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'EAGAIN') {
          continue
        }
        throw error
      }
      if (n === 0) {
        return bytes.length === 0 ? undefined : Buffer.from(bytes).toString('utf-8')
      }
      if (buffer[0] === 0x0a) {
        return Buffer.from(bytes).toString('utf-8').replace(/\r$/, '')
      }
      bytes.push(buffer[0])
    }
  }
}

function makeInterpreter(args: Args) {
  return new Interpreter({
    maxIterations: args.maxIterations,
    input: new StdinInput(),
    output: {write: (text) => console.log(text)},
    slots: new FileSlotStore(args.saves ?? defaultSlotDirectory()),
  })
}

function readSourceFile(inputFile: PathOrFileDescriptor) {
  const source = fs.readFileSync(inputFile, {encoding: 'utf-8'})
  if (source.startsWith('#!')) {
    return source.substring(source.indexOf('\n'))
  }
  return source
}

// A chunk of REPL input is complete once every TO has its END and every
// `[` its `]`.
function isComplete(lines: string[]) {
  const text = lines.join('\n')
  if (bracketBalance(text) > 0) {
    return false
  }
  const opensProcedure = /^\s*TO\s/i.test(lines[0])
  return !opensProcedure || /^\s*END\s*$/i.test(lines[lines.length - 1])
}

async function repl(args: Args, interp = makeInterpreter(args)) {
  console.log(`Welcome to TempleCode ${programVersion}.`)
  let history: string[] = []
  if (fs.existsSync(historyFile)) {
    history = fs.readFileSync(historyFile, {encoding: 'utf-8'}).split('\n').reverse()
  }
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
    history,
    historySize: Infinity,
    removeHistoryDuplicates: true,
  })
  rl.on('history', (history: string[]) => {
    const reversedHistory = [...history].reverse()
    fs.ensureDirSync(path.dirname(historyFile))
    fs.writeFileSync(historyFile, `${reversedHistory.join('\n')}\n`)
  })
  rl.on('SIGCONT', () => rl.resume())
  rl.prompt()
  // Procedures stay defined from one chunk to the next.
  const definitions: string[] = []
  let pending: string[] = []
  for await (const line of rl) {
    pending.push(line)
    if (!isComplete(pending)) {
      rl.setPrompt('. ')
      rl.prompt()
      continue
    }
    const chunk = pending.join('\n')
    pending = []
    rl.setPrompt('> ')
    try {
      if (/^\s*TO\s/i.test(chunk)) {
        definitions.push(chunk)
      }
      if (process.stdin.isTTY) {
        process.stdin.setRawMode(false)
      }
      interp.loadProgram([...definitions, chunk].join('\n'))
      interp.run()
      if (process.env.DEBUG) {
        debug(Object.fromEntries(interp.variables))
      }
    } catch (error) {
      if (process.env.DEBUG) {
        throw error
      }
      console.error(error instanceof Error ? error.message : error)
    }
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(true)
    }
    rl.prompt()
  }
}

// Sub-command action routines.

async function runCode(source: string, args: Args) {
  const interp = makeInterpreter(args)
  interp.loadProgram(source)
  const ok = interp.run()
  if (args.turtle !== undefined) {
    fs.writeJsonSync(args.turtle, interp.turtle, {spaces: 2})
  }
  if (args.interactive) {
    await repl(args, interp)
  } else if (!ok) {
    process.exitCode = 1
  }
}

async function evalCommand(args: Args) {
  await runCode(args.source, args)
}

async function runCommand(args: Args) {
  const inputFile = args.source === '-' ? process.stdin.fd : args.source
  await runCode(readSourceFile(inputFile), args)
}

async function interactCommand(args: Args) {
  await repl(args)
}

// Execute given commands and options.
if (process.argv.length >= 3) {
  // If our first argument is not a command or option, assume it's a file to run.
  const filename = process.argv[2]
  if (!filename.startsWith('-') && !commandNames.has(filename)) {
    process.argv.splice(2, 0, 'run')
  }
}

// Any otherwise uncaught exception is reported as an error.
try {
  const args: Args = parser.parse_args()
  if (args.func) {
    await args.func(args)
  } else {
    // If we have no sub-command, enter REPL.
    await repl(args)
  }
} catch (error) {
  if (process.env.DEBUG) {
    console.error(error)
  } else {
    console.error(`${path.basename(process.argv[1])}: ${error}`)
  }
  process.exitCode = 1
}
