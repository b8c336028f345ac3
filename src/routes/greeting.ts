import { FastifyInstance } from 'fastify'
import { route } from '../core/http'

export async function registerGreetingRoutes(app: FastifyInstance) {
  // ?lang=es selects the language; the onRequest hook has already fixed req.t to it
  app.get('/api/greeting', route(async (req) => ({
    // translators: Greeting returned by the example API endpoint
    message: req.t('Welcome to our application.'),
  })))
}
