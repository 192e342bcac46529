/**
 * Tool definitions advertised through ListTools
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

const stationProperty = {
  type: 'string',
  description: 'Station name, synonym, short code (e.g. "ASD") or UIC number (e.g. "8400058")',
};

const dateTimeProperty = {
  type: 'string',
  description: 'Optional ISO 8601 date-time, e.g. "2024-05-01T08:30". Defaults to now.',
};

const dailyDateProperty = {
  type: 'string',
  description: 'Optional date in YYYY-MM-DD format. Defaults to today.',
};

export const WEATHER_TOOLS: Tool[] = [
  {
    name: 'weather_forecast',
    description: 'Get current weather and a 24 hour forecast from Open-Meteo',
    inputSchema: {
      type: 'object',
      properties: {
        latitude: { type: 'number', description: 'Latitude in decimal degrees (-90 to 90)' },
        longitude: { type: 'number', description: 'Longitude in decimal degrees (-180 to 180)' },
      },
      required: ['latitude', 'longitude'],
    },
  },
];

export const NS_TOOLS: Tool[] = [
  {
    name: 'ns_resolve_station',
    description: 'Resolve a Dutch railway station name, synonym or code to its NS station code',
    inputSchema: {
      type: 'object',
      properties: { station: stationProperty },
      required: ['station'],
    },
  },
  {
    name: 'ns_get_stations',
    description: 'Search NS stations by name, or list every station when no query is given',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Optional search text' },
        limit: { type: 'number', description: 'Optional maximum number of stations (1-1000)' },
      },
    },
  },
  {
    name: 'ns_get_departures',
    description: 'Get train departures for a station',
    inputSchema: {
      type: 'object',
      properties: {
        station: stationProperty,
        dateTime: dateTimeProperty,
        maxJourneys: { type: 'number', description: 'Optional number of departures (1-100)' },
      },
      required: ['station'],
    },
  },
  {
    name: 'ns_get_arrivals',
    description: 'Get train arrivals for a station',
    inputSchema: {
      type: 'object',
      properties: {
        station: stationProperty,
        dateTime: dateTimeProperty,
        maxJourneys: { type: 'number', description: 'Optional number of arrivals (1-100)' },
      },
      required: ['station'],
    },
  },
  {
    name: 'ns_plan_trip',
    description: 'Plan a train journey between two stations. Fast and international connections that run are listed first.',
    inputSchema: {
      type: 'object',
      properties: {
        fromStation: stationProperty,
        toStation: stationProperty,
        viaStation: { ...stationProperty, description: `Optional via station. ${stationProperty.description}` },
        dateTime: dateTimeProperty,
        searchForArrival: { type: 'boolean', description: 'Treat dateTime as the desired arrival time' },
      },
      required: ['fromStation', 'toStation'],
    },
  },
  {
    name: 'ns_get_price',
    description: 'Get the ticket price between two stations',
    inputSchema: {
      type: 'object',
      properties: {
        fromStation: stationProperty,
        toStation: stationProperty,
        travelClass: { type: 'number', enum: [1, 2], description: 'Optional travel class, 1 or 2' },
        travelType: { type: 'string', enum: ['single', 'return'], description: 'Optional single or return ticket' },
        adults: { type: 'number', description: 'Optional number of adult travellers (1-10)' },
      },
      required: ['fromStation', 'toStation'],
    },
  },
  {
    name: 'ns_get_ovfiets',
    description: 'Get OV-fiets (rental bike) availability at a station',
    inputSchema: {
      type: 'object',
      properties: { station: stationProperty },
      required: ['station'],
    },
  },
  {
    name: 'ns_get_disruptions',
    description: 'Get current disruptions and maintenance affecting a station',
    inputSchema: {
      type: 'object',
      properties: { station: stationProperty },
      required: ['station'],
    },
  },
];

export const AIRLABS_TOOLS: Tool[] = [
  {
    name: 'airlabs_get_flight_status',
    description: 'Get real-time status, departure and arrival information for a flight',
    inputSchema: {
      type: 'object',
      properties: {
        flight_iata: { type: 'string', description: 'IATA flight number, e.g. "KL601"' },
      },
      required: ['flight_iata'],
    },
  },
  {
    name: 'airlabs_get_schedules',
    description: 'Get flight schedules from and/or to an airport',
    inputSchema: {
      type: 'object',
      properties: {
        dep_iata: { type: 'string', description: 'Optional departure airport IATA code, e.g. "AMS"' },
        arr_iata: { type: 'string', description: 'Optional arrival airport IATA code, e.g. "SFO"' },
        date: dailyDateProperty,
      },
    },
  },
  {
    name: 'airlabs_search_airports',
    description: 'Search airports by name, city or code to find the IATA code',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'City or airport name, e.g. "London" or "Heathrow"' },
      },
      required: ['query'],
    },
  },
  {
    name: 'airlabs_get_airport_delays',
    description: 'Get delayed departures from an airport',
    inputSchema: {
      type: 'object',
      properties: {
        airport_iata: { type: 'string', description: 'Airport IATA code, e.g. "AMS"' },
        min_delay: { type: 'number', description: 'Optional minimum delay in minutes (default 30)' },
      },
      required: ['airport_iata'],
    },
  },
];

export const OBSIDIAN_TOOLS: Tool[] = [
  {
    name: 'obsidian_search_notes',
    description: 'Search notes in the GitHub-synced Obsidian vault',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Text to search for' },
      },
      required: ['query'],
    },
  },
  {
    name: 'obsidian_read_note',
    description: 'Read a note from the vault',
    inputSchema: {
      type: 'object',
      properties: {
        filename: { type: 'string', description: 'Path of the note, e.g. "Daily Notes/2024-01-01.md"' },
      },
      required: ['filename'],
    },
  },
  {
    name: 'obsidian_get_daily_note',
    description: 'Read a daily note',
    inputSchema: {
      type: 'object',
      properties: { date: dailyDateProperty },
    },
  },
  {
    name: 'obsidian_append_todo',
    description: 'Append a to-do item to a daily note',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text of the to-do item' },
        date: dailyDateProperty,
      },
      required: ['text'],
    },
  },
];

export const SERVER_TOOLS: Tool[] = [
  {
    name: 'greet',
    description: 'Greet a user by name',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Name of the person to greet' },
      },
      required: ['name'],
    },
  },
  {
    name: 'get_server_info',
    description: 'Get server status',
    inputSchema: { type: 'object', properties: {} },
  },
];

export const ALL_TOOLS: Tool[] = [
  ...WEATHER_TOOLS,
  ...NS_TOOLS,
  ...AIRLABS_TOOLS,
  ...OBSIDIAN_TOOLS,
  ...SERVER_TOOLS,
];
