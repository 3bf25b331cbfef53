import { createInterface } from 'node:readline'
import { fromEvent } from 'rxjs'
import { map, takeUntil } from 'rxjs/operators'
import { catchAndReport, safeSubscribe } from '@dexnav/errors'
import { createPokedexSession } from '@dexnav/pokedex'
import { createApi } from './api/api'
import { HELP, parseCommand } from './commands'
import { loadConfig } from './config'
import { errorHandler, errorSub } from './error-handler'
import { pokemonView } from './views/pokemon.view'

const config = loadConfig(process.env)
const session = createPokedexSession(createApi(config), { initialId: config.initialId })
const { store } = session

const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' })
const close$ = fromEvent(rl, 'close')

function print(text: string): void {
  console.log(text)
  rl.prompt()
}

// ---------------------------------------------------------------------------
// Render
// ---------------------------------------------------------------------------

const viewSub = safeSubscribe(pokemonView(store.state$), errorHandler, print, {
  context: 'terminal/render',
})

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

const inputSub = fromEvent<string>(rl, 'line')
  .pipe(
    map(parseCommand),
    takeUntil(close$),
    catchAndReport(errorHandler, { context: 'terminal/input' }),
  )
  .subscribe((command) => {
    switch (command.kind) {
      case 'dispatch':
        store.dispatch(command.action)
        break
      case 'help':
        print(HELP)
        break
      case 'quit':
        rl.close()
        break
      case 'none':
        rl.prompt()
        break
    }
  })

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

print('dexnav — type "h" for help')
const sessionSub = session.start()

close$.subscribe(() => {
  sessionSub.unsubscribe()
  inputSub.unsubscribe()
  viewSub.unsubscribe()
  errorSub.unsubscribe()
})
