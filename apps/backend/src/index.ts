// apps/backend/src/index.ts
import 'dotenv/config'
import { createApp } from './app.js'
import { loadServerConfig, readApiKey, API_KEY_ENV_NAMES } from './lib/config.js'

const { port, corsOrigins } = loadServerConfig()
const app = createApp({ corsOrigins })

app.listen(port, () => {
  console.log(`Creative Agent running on http://localhost:${port}/`)
  console.log(`Health check at http://localhost:${port}/api/health`)
  if (!readApiKey()) {
    console.warn(`[config] no API key found (${API_KEY_ENV_NAMES.join(' / ')}); generation requests will fail until one is set`)
  }
})

export default app
