import { describe, it, expect, beforeEach } from '@jest/globals';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { PokeMCPServer, SERVER_INFO } from '../src/server';
import { loadConfig } from '../src/core/config';
import type { MCPToolResponse } from '../src/types/mcp.types';
import { mockFetch } from './setup';
import { jsonResponse, requestedUrl, routeFetch, stationsRoute, textResponse, trip } from './helpers/mockHelper';

const FULL_ENV = {
  NS_API_KEY: 'test-secret',
  NS_GATEWAY_URL: 'https://ns.test',
  AIRLABS_API_KEY: 'test-secret',
  AIRLABS_BASE_URL: 'https://airlabs.test/api/v9',
  GITHUB_PERSONAL_TOKEN: 'test-secret',
  GITHUB_API_URL: 'https://github.test',
  OBSIDIAN_GITHUB_REPO: 'owner/vault',
  OBSIDIAN_DAILY_NOTES_DIR: 'Daily Notes',
  OPEN_METEO_URL: 'https://weather.test',
};

const textOf = (response: MCPToolResponse): string => response.content[0]?.text ?? '';

const jsonOf = (response: MCPToolResponse): unknown => {
  const parsed: unknown = JSON.parse(textOf(response));
  return parsed;
};

describe('PokeMCPServer', () => {
  let server: PokeMCPServer;

  beforeEach(() => {
    server = new PokeMCPServer(loadConfig(FULL_ENV));
  });

  describe('tool listing', () => {
    it('advertises every tool once with an object schema', () => {
      const tools = server.listTools();
      const names = tools.map(tool => tool.name);

      expect(names).toEqual([
        'weather_forecast',
        'ns_resolve_station',
        'ns_get_stations',
        'ns_get_departures',
        'ns_get_arrivals',
        'ns_plan_trip',
        'ns_get_price',
        'ns_get_ovfiets',
        'ns_get_disruptions',
        'airlabs_get_flight_status',
        'airlabs_get_schedules',
        'airlabs_search_airports',
        'airlabs_get_airport_delays',
        'obsidian_search_notes',
        'obsidian_read_note',
        'obsidian_get_daily_note',
        'obsidian_append_todo',
        'greet',
        'get_server_info',
      ]);
      expect(tools.every(tool => tool.inputSchema.type === 'object')).toBe(true);
    });

    it('builds an SDK server', () => {
      expect(server.createServer()).toBeInstanceOf(Server);
    });
  });

  describe('dispatch', () => {
    it('greets by name', async () => {
      const response = await server.callTool('greet', { name: 'Ada' });
      expect(response).toEqual({ content: [{ type: 'text', text: 'Hello, Ada! Welcome to the Poke MCP server!' }] });
    });

    it('returns validation failures as error results', async () => {
      const response = await server.callTool('greet', {});

      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe(
        'Error (Invalid input): Invalid name: must be a non-empty string\n\n' +
        'Suggestions:\n• Check the argument names and formats'
      );
    });

    it('rejects non-object arguments', async () => {
      const response = await server.callTool('greet', ['Ada']);
      expect(textOf(response)).toMatch(/^Error \(Invalid input\): Invalid arguments: expected object, got array\n/);
    });

    it('throws for an unknown tool', async () => {
      await expect(server.callTool('search_trains', {})).rejects.toThrow('Unknown tool: search_trains');
    });

    it('stops taking calls once shutting down', async () => {
      server.beginShutdown();

      await expect(server.callTool('greet', { name: 'Ada' })).rejects.toThrow('Server is shutting down');
      expect(server.getHealthStatus().status).toBe('shutting_down');
    });

    it('reports which integrations are configured', async () => {
      const bare = new PokeMCPServer(loadConfig({}));

      expect(jsonOf(await bare.callTool('get_server_info'))).toEqual({
        server_name: SERVER_INFO.DISPLAY_NAME,
        version: '1.2.0',
        status: 'online',
        modules: ['Weather', 'NS', 'AirLabs', 'Obsidian'],
        configured: { weather: true, ns: false, airlabs: false, obsidian: false },
      });
    });

    it('explains a missing integration', async () => {
      const bare = new PokeMCPServer(loadConfig({}));

      const response = await bare.callTool('airlabs_get_flight_status', { flight_iata: 'KL601' });

      expect(response.isError).toBe(true);
      expect(textOf(response)).toMatch(
        /^Error \(Integration not configured\): AirLabs integration is not configured: AIRLABS_API_KEY is missing\n/
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('weather', () => {
    it('returns the forecast as JSON', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ current_weather: { temperature: 14.2 } }));

      const response = await server.callTool('weather_forecast', { latitude: 52.37, longitude: '4.89' });

      expect(jsonOf(response)).toEqual({ current_weather: { temperature: 14.2 } });
      expect(requestedUrl().searchParams.get('longitude')).toBe('4.89');
    });

    it('rejects coordinates out of range', async () => {
      const response = await server.callTool('weather_forecast', { latitude: 100, longitude: 4.89 });
      expect(textOf(response)).toMatch(/^Error \(Invalid input\): Invalid latitude: must be between -90 and 90\n/);
    });

    it('reports an unreachable upstream', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      const response = await server.callTool('weather_forecast', { latitude: 52.37, longitude: 4.89 });

      expect(response.isError).toBe(true);
      expect(textOf(response)).toMatch(/^Error \(Network problem\): Open-Meteo request failed: fetch failed\n/);
    });
  });

  describe('NS', () => {
    it('resolves a short code without a request', async () => {
      const response = await server.callTool('ns_resolve_station', { station: 'ASD' });

      expect(jsonOf(response)).toEqual({ query: 'ASD', code: 'ASD', resolvedBy: 'code' });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('reports a station that cannot be resolved', async () => {
      routeFetch({ '/reisinformatie-api/api/v2/stations': stationsRoute });

      const response = await server.callTool('ns_resolve_station', { station: 'Groningen' });

      expect(response.isError).toBe(true);
      expect(textOf(response)).toMatch(/^Error \(Nothing usable found\): Could not resolve station "Groningen"\n/);
    });

    it('plans a trip with ranked results', async () => {
      routeFetch({
        '/reisinformatie-api/api/v2/stations': stationsRoute,
        '/reisinformatie-api/api/v3/trips': () => jsonResponse({
          trips: [trip('A', ['SPR']), trip('B', ['ICE'], 'CANCELLED'), trip('C', ['ICD'])],
        }),
      });

      const response = await server.callTool('ns_plan_trip', {
        fromStation: 'Amsterdam Centraal',
        toStation: 'rotterdamc',
        dateTime: '2024-05-01T08:30',
      });

      expect(jsonOf(response)).toEqual({
        fromStation: 'ASD',
        toStation: 'RTD',
        trips: [trip('C', ['ICD']), trip('A', ['SPR']), trip('B', ['ICE'], 'CANCELLED')],
      });
    });

    it('says so when no trips come back', async () => {
      routeFetch({ '/reisinformatie-api/api/v3/trips': () => jsonResponse({ trips: [] }) });

      const response = await server.callTool('ns_plan_trip', { fromStation: 'ASD', toStation: 'UT' });
      expect(textOf(response)).toBe('No trips found from ASD to UT.');
    });

    it('validates the ticket type', async () => {
      const response = await server.callTool('ns_get_price', { fromStation: 'ASD', toStation: 'UT', travelType: 'first' });
      expect(textOf(response)).toMatch(/^Error \(Invalid input\): Invalid travelType: must be "single" or "return"\n/);
    });

    it('says so when a station has no disruptions', async () => {
      routeFetch({ '/reisinformatie-api/api/v3/disruptions/station/UT': () => jsonResponse([]) });

      const response = await server.callTool('ns_get_disruptions', { station: 'UT' });
      expect(textOf(response)).toBe('No current disruptions reported for UT.');
    });
  });

  describe('AirLabs', () => {
    it('normalizes the flight number and handles an untracked flight', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ response: {} }));

      const response = await server.callTool('airlabs_get_flight_status', { flight_iata: 'kl 601' });

      expect(textOf(response)).toBe('No live tracking information found for flight KL601.');
      expect(requestedUrl().searchParams.get('flight_iata')).toBe('KL601');
    });

    it('needs at least one airport for schedules', async () => {
      const response = await server.callTool('airlabs_get_schedules', { date: '2024-05-01' });
      expect(textOf(response)).toMatch(/^Error \(Invalid input\): Invalid arguments: provide dep_iata, arr_iata or both\n/);
    });

    it('reports quiet airports with the threshold used', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ response: [] }));

      const response = await server.callTool('airlabs_get_airport_delays', { airport_iata: 'ams' });

      expect(textOf(response)).toBe('No significant delays (>30min) reported for departures from AMS right now.');
    });

    it('passes an authentication failure through', async () => {
      mockFetch.mockResolvedValueOnce(textResponse('forbidden', 403));

      const response = await server.callTool('airlabs_get_flight_status', { flight_iata: 'KL601' });
      expect(textOf(response)).toMatch(/^Error \(Authentication problem\): AirLabs API key is invalid or expired\n/);
    });
  });

  describe('Obsidian', () => {
    it('says so when a search finds nothing', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ total_count: 0, items: [] }));

      const response = await server.callTool('obsidian_search_notes', { query: 'groceries' });
      expect(textOf(response)).toBe('No notes found matching that text.');
    });

    it('returns the note text', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({
        path: 'Projects/plan.md',
        sha: 'abc123',
        content: Buffer.from('# Plan').toString('base64'),
        encoding: 'base64',
      }));

      const response = await server.callTool('obsidian_read_note', { filename: 'Projects/plan' });
      expect(textOf(response)).toBe('# Plan');
    });

    it('appends a to-do to the requested daily note', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({
          path: 'Daily Notes/2024-05-01.md',
          sha: 'abc123',
          content: Buffer.from('# Today').toString('base64'),
          encoding: 'base64',
        }))
        .mockResolvedValueOnce(jsonResponse({ commit: { sha: 'def456' } }));

      const response = await server.callTool('obsidian_append_todo', { text: 'Buy milk', date: '2024-05-01' });

      expect(textOf(response)).toBe('Successfully added to-do to 2024-05-01 (Daily Notes/2024-05-01.md)');
    });

    it('rejects an impossible date', async () => {
      const response = await server.callTool('obsidian_get_daily_note', { date: '2024-02-30' });
      expect(textOf(response)).toMatch(/^Error \(Invalid input\): Invalid date: expected a date in YYYY-MM-DD format\n/);
    });
  });

  it('reports health', () => {
    expect(server.getHealthStatus()).toEqual({
      status: 'healthy',
      timestamp: expect.any(String),
      version: SERVER_INFO.VERSION,
      sessionId: expect.stringMatching(/^session_\d+_[a-z0-9]+$/),
    });
  });
});
