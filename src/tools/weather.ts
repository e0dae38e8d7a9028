import type {JsonObject} from '../core/json.js'
import type {Tool} from './registry.js'

type WeatherReport = {
  city: string
  temperature: string
  conditions: string
}

// Canned data; a real tool would call a weather API here.
const WEATHER_DATA: Record<string, WeatherReport> = {
  London: {city: 'London', temperature: '15°C', conditions: 'Rainy'},
  Stockholm: {city: 'Stockholm', temperature: '10°C', conditions: 'Sunny'},
  Brno: {city: 'Brno', temperature: '18°C', conditions: 'Clear skies'}
}

export function weatherReport(args: JsonObject): string {
  const city = args.city
  if (typeof city !== 'string') {
    throw new Error('city must be a string')
  }

  if (!Object.hasOwn(WEATHER_DATA, city)) throw new Error('city not found')
  return JSON.stringify(WEATHER_DATA[city])
}

export function weatherTool(): Tool {
  return {
    name: 'weather',
    description: 'Get weather report for a city',
    parameters: {
      type: 'object',
      properties: {
        city: {
          type: 'string',
          description: 'The city for which to get the weather report'
        }
      },
      required: ['city']
    },
    execute: weatherReport
  }
}
