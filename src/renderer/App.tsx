import type { ChatStore } from './stores/chatStore'
import type { StudioStore } from './stores/studioStore'
import ChatApp from './components/Chat/ChatApp'
import StudioApp from './components/Studio/StudioApp'

export type AppScreen = { screen: 'chat'; store: ChatStore } | { screen: 'studio'; store: StudioStore }

function App(props: AppScreen): JSX.Element {
  return props.screen === 'chat' ? <ChatApp store={props.store} /> : <StudioApp store={props.store} />
}

export default App
