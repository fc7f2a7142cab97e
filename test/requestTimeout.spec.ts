import type { Server } from 'node:http'

import express from 'express'

import { createRequestTimeout } from '../src/middleware/requestTimeout'
import { requestLogger } from '../src/middleware/requestLogger'

describe('createRequestTimeout', () => {
  let server: Server
  let baseUrl: string

  beforeAll(async () => {
    const app = express()
    app.use(requestLogger)
    app.use(createRequestTimeout(10))
    app.get('/slow', (_req, res) => {
      setTimeout(() => {
        if (!res.headersSent) res.json({ done: true })
      }, 100)
    })
    app.get('/fast', (_req, res) => {
      res.json({ done: true })
    })

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening))
    })
    const address = server.address()
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port')
    }
    baseUrl = `http://127.0.0.1:${address.port}`
  })

  afterAll(async () => {
    // Let the slow handler's timer fire before closing
    await new Promise((resolve) => setTimeout(resolve, 150))
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()))
    })
  })

  it('answers 408 when the handler is too slow', async () => {
    const res = await fetch(`${baseUrl}/slow`)

    expect(res.status).toBe(408)
    expect(await res.json()).toEqual({
      error: 'Request timeout',
      message: 'Request processing exceeded 0.01 seconds',
    })
  })

  it('leaves fast responses untouched', async () => {
    const res = await fetch(`${baseUrl}/fast`)

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ done: true })
  })
})
