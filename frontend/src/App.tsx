import ControlPage from './pages/ControlPage'

function App() {
  return <ControlPage />
}

export default App
