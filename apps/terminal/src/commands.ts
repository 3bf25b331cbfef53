import type { PokedexAction } from '@dexnav/pokedex'

export type TerminalCommand =
  | { kind: 'dispatch'; action: PokedexAction }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'none' }

export const HELP = [
  'n, next          next Pokémon',
  'p, prev          previous Pokémon',
  'r, refresh       reload (also retries a failed load)',
  'g, go <id>       jump to an id (or just type the id)',
  'h, help          this list',
  'q, quit          exit',
].join('\n')

const dispatch = (action: PokedexAction): TerminalCommand => ({ kind: 'dispatch', action })

/** Maps one input line to a command. Unknown words are treated as jump input. */
export function parseCommand(line: string): TerminalCommand {
  const text = line.trim()
  if (text === '') return { kind: 'none' }

  const [word, ...rest] = text.split(/\s+/)
  switch (word.toLowerCase()) {
    case 'n':
    case 'next':
      return dispatch({ type: 'NEXT' })
    case 'p':
    case 'prev':
      return dispatch({ type: 'PREV' })
    case 'r':
    case 'refresh':
    case 'retry':
      return dispatch({ type: 'REFRESH' })
    case 'g':
    case 'go':
      return dispatch({ type: 'JUMP', input: rest.join(' ') })
    case 'h':
    case 'help':
    case '?':
      return { kind: 'help' }
    case 'q':
    case 'quit':
    case 'exit':
      return { kind: 'quit' }
    default:
      return dispatch({ type: 'JUMP', input: text })
  }
}
