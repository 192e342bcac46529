import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { AppConfig } from './core/config.js';
import { ErrorCategory, ErrorHandler, ToolError, UnresolvedStationError } from './core/error-handler.js';
import { AirLabsService, DEFAULT_DELAY_THRESHOLD_MINUTES } from './services/airlabs-service.js';
import { createNsService, NsService } from './services/ns-service.js';
import { ObsidianService } from './services/obsidian-service.js';
import { WeatherService } from './services/weather-service.js';
import { ALL_TOOLS } from './tools/definitions.js';
import { TimeUtils } from './utils/time-utils.js';
import { ValidationUtils, VALIDATION_LIMITS } from './utils/validation-utils.js';
import type { MCPToolResponse, ToolArguments } from './types/mcp.types.js';
import type { TravelClass, TravelType } from './types/ns.types.js';

interface NodeSystemError extends Error {
  code?: string;
}

export const SERVER_INFO = {
  NAME: 'poke-mcp-server',
  DISPLAY_NAME: 'Poke MCP Server',
  VERSION: '1.2.0',
} as const;

// Process exit codes
const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
} as const;

const TIMEOUTS = {
  GRACEFUL_SHUTDOWN: 5000,      // 5 seconds for graceful shutdown
  SHUTDOWN_WAIT: 1000,          // 1 second wait before shutdown
} as const;

const SESSION_ID_LENGTH = 9;

const CODE_PATTERNS = {
  FLIGHT_IATA: /^[A-Z0-9]{2}\d{1,4}[A-Z]?$/,
  AIRPORT_IATA: /^[A-Z]{3}$/,
} as const;

export interface ServiceRegistry {
  weather: WeatherService;
  ns?: NsService;
  airlabs?: AirLabsService;
  obsidian?: ObsidianService;
}

/**
 * One service per configured integration; unconfigured ones stay undefined
 */
export function createServices(config: AppConfig, errorHandler: ErrorHandler): ServiceRegistry {
  return {
    weather: new WeatherService(config.weather),
    ns: config.ns ? createNsService(config.ns, errorHandler) : undefined,
    airlabs: config.airlabs ? new AirLabsService(config.airlabs) : undefined,
    obsidian: config.github ? new ObsidianService(config.github) : undefined,
  };
}

function textResponse(text: string): MCPToolResponse {
  return { content: [{ type: 'text', text }] };
}

function jsonResponse(data: unknown): MCPToolResponse {
  return textResponse(JSON.stringify(data, null, 2));
}

function toTravelClass(value: number | undefined): TravelClass | undefined {
  if (value === 1 || value === 2) return value;
  return undefined;
}

function toTravelType(value: string | undefined): TravelType | undefined {
  if (value === undefined) return undefined;
  if (value === 'single' || value === 'return') return value;
  throw new ToolError(ErrorCategory.VALIDATION, 'Invalid travelType: must be "single" or "return"', { field: 'travelType' });
}

class PokeMCPServer {
  private isShuttingDown = false;
  private readonly sessionId: string;
  private readonly errorHandler: ErrorHandler;
  private readonly services: ServiceRegistry;

  constructor(config: AppConfig) {
    this.sessionId = `session_${Date.now()}_${Math.random().toString(36).substring(2, 2 + SESSION_ID_LENGTH)}`;
    this.errorHandler = new ErrorHandler(this.sessionId);
    this.services = createServices(config, this.errorHandler);

    for (const warning of config.warnings) {
      this.errorHandler.logWarning(`Configuration: ${warning}`);
    }
  }

  /**
   * Build an SDK server wired to this instance's tool handlers.
   * The HTTP transport builds one per request, stdio builds one at start.
   */
  createServer(): Server {
    const server = new Server(
      {
        name: SERVER_INFO.NAME,
        version: SERVER_INFO.VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.listTools() };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });

    return server;
  }

  listTools(): Tool[] {
    return ALL_TOOLS;
  }

  /**
   * Run one tool. Tool failures come back as error results, never as throws;
   * only an unknown tool name or a shutting-down server throws.
   */
  async callTool(name: string, rawArgs?: unknown): Promise<MCPToolResponse> {
    if (this.isShuttingDown) {
      throw new Error('Server is shutting down');
    }
    if (!ALL_TOOLS.some(tool => tool.name === name)) {
      throw new Error(`Unknown tool: ${name}`);
    }

    try {
      const args = ValidationUtils.validateArguments(rawArgs);
      return await this.dispatch(name, args);
    } catch (error) {
      const categorized = this.errorHandler.categorizeError(error, { tool: name });
      if (categorized.category === ErrorCategory.SYSTEM) {
        this.errorHandler.logError(`Tool ${name} failed`, error, categorized.context);
      } else {
        this.errorHandler.logWarning(`Tool ${name} failed: ${categorized.message}`, {
          category: categorized.category,
          ...categorized.context,
        });
      }
      return this.errorHandler.createErrorResponse(categorized, name);
    }
  }

  private async dispatch(name: string, args: ToolArguments): Promise<MCPToolResponse> {
    switch (name) {
      case 'weather_forecast':
        return this.handleWeatherForecast(args);

      case 'ns_resolve_station':
        return this.handleResolveStation(args);
      case 'ns_get_stations':
        return this.handleGetStations(args);
      case 'ns_get_departures':
        return this.handleStationBoard(args, 'departures');
      case 'ns_get_arrivals':
        return this.handleStationBoard(args, 'arrivals');
      case 'ns_plan_trip':
        return this.handlePlanTrip(args);
      case 'ns_get_price':
        return this.handleGetPrice(args);
      case 'ns_get_ovfiets':
        return this.handleGetOvFiets(args);
      case 'ns_get_disruptions':
        return this.handleGetDisruptions(args);

      case 'airlabs_get_flight_status':
        return this.handleFlightStatus(args);
      case 'airlabs_get_schedules':
        return this.handleSchedules(args);
      case 'airlabs_search_airports':
        return this.handleSearchAirports(args);
      case 'airlabs_get_airport_delays':
        return this.handleAirportDelays(args);

      case 'obsidian_search_notes':
        return this.handleSearchNotes(args);
      case 'obsidian_read_note':
        return this.handleReadNote(args);
      case 'obsidian_get_daily_note':
        return this.handleDailyNote(args);
      case 'obsidian_append_todo':
        return this.handleAppendTodo(args);

      case 'greet':
        return textResponse(`Hello, ${ValidationUtils.requireString(args, 'name')}! Welcome to the Poke MCP server!`);
      case 'get_server_info':
        return jsonResponse(this.getServerInfo());

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  // Weather

  private async handleWeatherForecast(args: ToolArguments): Promise<MCPToolResponse> {
    const latitude = ValidationUtils.requireNumber(args, 'latitude', -90, 90);
    const longitude = ValidationUtils.requireNumber(args, 'longitude', -180, 180);
    return jsonResponse(await this.services.weather.getForecast({ latitude, longitude }));
  }

  // NS

  private requireNs(): NsService {
    if (!this.services.ns) {
      throw new ToolError(ErrorCategory.CONFIGURATION, 'NS integration is not configured: NS_API_KEY is missing');
    }
    return this.services.ns;
  }

  private async handleResolveStation(args: ToolArguments): Promise<MCPToolResponse> {
    const station = ValidationUtils.requireString(args, 'station');
    const resolution = await this.requireNs().resolveStation(station);
    if (!resolution.resolved) {
      throw new UnresolvedStationError(station, resolution.failures);
    }
    return jsonResponse({ query: resolution.query, code: resolution.code, resolvedBy: resolution.tier });
  }

  private async handleGetStations(args: ToolArguments): Promise<MCPToolResponse> {
    const query = ValidationUtils.optionalString(args, 'query');
    const limit = ValidationUtils.optionalInteger(args, 'limit', 1, 1000);
    const stations = await this.requireNs().listStations(query, limit);
    if (stations.length === 0) {
      return textResponse(query ? `No stations found matching "${query}".` : 'The station directory is empty.');
    }
    return jsonResponse(stations);
  }

  private async handleStationBoard(args: ToolArguments, board: 'departures' | 'arrivals'): Promise<MCPToolResponse> {
    const params = {
      station: ValidationUtils.requireString(args, 'station'),
      dateTime: ValidationUtils.optionalDateTime(args, 'dateTime'),
      maxJourneys: ValidationUtils.optionalInteger(args, 'maxJourneys', 1, 100),
    };
    const ns = this.requireNs();
    const payload = board === 'departures' ? await ns.getDepartures(params) : await ns.getArrivals(params);
    return jsonResponse(payload);
  }

  private async handlePlanTrip(args: ToolArguments): Promise<MCPToolResponse> {
    const result = await this.requireNs().planTrip({
      fromStation: ValidationUtils.requireString(args, 'fromStation'),
      toStation: ValidationUtils.requireString(args, 'toStation'),
      viaStation: ValidationUtils.optionalString(args, 'viaStation'),
      dateTime: ValidationUtils.optionalDateTime(args, 'dateTime'),
      searchForArrival: ValidationUtils.optionalBoolean(args, 'searchForArrival'),
    });

    if (result.trips.length === 0) {
      return textResponse(`No trips found from ${result.fromStation} to ${result.toStation}.`);
    }
    return jsonResponse(result);
  }

  private async handleGetPrice(args: ToolArguments): Promise<MCPToolResponse> {
    const price = await this.requireNs().getPrice({
      fromStation: ValidationUtils.requireString(args, 'fromStation'),
      toStation: ValidationUtils.requireString(args, 'toStation'),
      travelClass: toTravelClass(ValidationUtils.optionalInteger(args, 'travelClass', 1, 2)),
      travelType: toTravelType(ValidationUtils.optionalString(args, 'travelType')),
      adults: ValidationUtils.optionalInteger(args, 'adults', 1, 10),
    });
    return jsonResponse(price);
  }

  private async handleGetOvFiets(args: ToolArguments): Promise<MCPToolResponse> {
    const station = ValidationUtils.requireString(args, 'station');
    const locations = await this.requireNs().getOvFiets(station);
    if (locations.length === 0) {
      return textResponse(`No OV-fiets locations found at ${station}.`);
    }
    return jsonResponse(locations);
  }

  private async handleGetDisruptions(args: ToolArguments): Promise<MCPToolResponse> {
    const station = ValidationUtils.requireString(args, 'station');
    const disruptions = await this.requireNs().getDisruptions(station);
    if (disruptions.length === 0) {
      return textResponse(`No current disruptions reported for ${station}.`);
    }
    return jsonResponse(disruptions);
  }

  // AirLabs

  private requireAirLabs(): AirLabsService {
    if (!this.services.airlabs) {
      throw new ToolError(ErrorCategory.CONFIGURATION, 'AirLabs integration is not configured: AIRLABS_API_KEY is missing');
    }
    return this.services.airlabs;
  }

  private async handleFlightStatus(args: ToolArguments): Promise<MCPToolResponse> {
    const flightIata = ValidationUtils.requireCode(args, 'flight_iata', CODE_PATTERNS.FLIGHT_IATA, 'KL601');
    const flight = await this.requireAirLabs().getFlightStatus(flightIata);
    if (!flight) {
      return textResponse(`No live tracking information found for flight ${flightIata}.`);
    }
    return jsonResponse(flight);
  }

  private async handleSchedules(args: ToolArguments): Promise<MCPToolResponse> {
    const depIata = ValidationUtils.optionalCode(args, 'dep_iata', CODE_PATTERNS.AIRPORT_IATA, 'AMS');
    const arrIata = ValidationUtils.optionalCode(args, 'arr_iata', CODE_PATTERNS.AIRPORT_IATA, 'SFO');
    const date = ValidationUtils.optionalDate(args, 'date');
    if (!depIata && !arrIata) {
      throw new ToolError(ErrorCategory.VALIDATION, 'Invalid arguments: provide dep_iata, arr_iata or both', { field: 'dep_iata' });
    }

    const flights = await this.requireAirLabs().getSchedules({ depIata, arrIata, date });
    if (flights.length === 0) {
      return textResponse(`No scheduled flights found for ${depIata ?? 'any airport'} -> ${arrIata ?? 'any airport'}.`);
    }
    return jsonResponse(flights);
  }

  private async handleSearchAirports(args: ToolArguments): Promise<MCPToolResponse> {
    const query = ValidationUtils.requireString(args, 'query');
    const airports = await this.requireAirLabs().searchAirports(query);
    if (airports.length === 0) {
      return textResponse(`No airports found matching "${query}".`);
    }
    return jsonResponse(airports);
  }

  private async handleAirportDelays(args: ToolArguments): Promise<MCPToolResponse> {
    const airportIata = ValidationUtils.requireCode(args, 'airport_iata', CODE_PATTERNS.AIRPORT_IATA, 'AMS');
    const minDelay = ValidationUtils.optionalInteger(args, 'min_delay', 0, 1440) ?? DEFAULT_DELAY_THRESHOLD_MINUTES;
    const delays = await this.requireAirLabs().getAirportDelays(airportIata, minDelay);
    if (delays.length === 0) {
      return textResponse(`No significant delays (>${minDelay}min) reported for departures from ${airportIata} right now.`);
    }
    return jsonResponse(delays);
  }

  // Obsidian

  private requireObsidian(): ObsidianService {
    if (!this.services.obsidian) {
      throw new ToolError(
        ErrorCategory.CONFIGURATION,
        'Obsidian integration is not configured: GITHUB_PERSONAL_TOKEN and OBSIDIAN_GITHUB_REPO are required'
      );
    }
    return this.services.obsidian;
  }

  private async handleSearchNotes(args: ToolArguments): Promise<MCPToolResponse> {
    const query = ValidationUtils.requireString(args, 'query');
    const paths = await this.requireObsidian().searchNotes(query);
    if (paths.length === 0) {
      return textResponse('No notes found matching that text.');
    }
    return jsonResponse(paths);
  }

  private async handleReadNote(args: ToolArguments): Promise<MCPToolResponse> {
    const filename = ValidationUtils.requireString(args, 'filename');
    const note = await this.requireObsidian().readNote(filename);
    return textResponse(note.content);
  }

  private async handleDailyNote(args: ToolArguments): Promise<MCPToolResponse> {
    const date = ValidationUtils.optionalDate(args, 'date') ?? TimeUtils.getCurrentDate();
    const note = await this.requireObsidian().getDailyNote(date);
    return textResponse(note.content);
  }

  private async handleAppendTodo(args: ToolArguments): Promise<MCPToolResponse> {
    const text = ValidationUtils.requireString(args, 'text', VALIDATION_LIMITS.MAX_TODO_LENGTH);
    const date = ValidationUtils.optionalDate(args, 'date') ?? TimeUtils.getCurrentDate();
    const result = await this.requireObsidian().appendTodo(text, date);
    return textResponse(`Successfully added to-do to ${result.date} (${result.path})`);
  }

  // Server

  getServerInfo() {
    return {
      server_name: SERVER_INFO.DISPLAY_NAME,
      version: SERVER_INFO.VERSION,
      status: this.isShuttingDown ? 'shutting_down' : 'online',
      modules: ['Weather', 'NS', 'AirLabs', 'Obsidian'],
      configured: {
        weather: true,
        ns: this.services.ns !== undefined,
        airlabs: this.services.airlabs !== undefined,
        obsidian: this.services.obsidian !== undefined,
      },
    };
  }

  getHealthStatus() {
    return {
      status: this.isShuttingDown ? 'shutting_down' : 'healthy',
      timestamp: new Date().toISOString(),
      version: SERVER_INFO.VERSION,
      sessionId: this.sessionId,
    };
  }

  /**
   * Stop accepting tool calls; in-flight calls finish normally
   */
  beginShutdown(): void {
    this.isShuttingDown = true;
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  private setupGracefulShutdown() {
    const gracefulShutdown = async (signal: string) => {
      this.errorHandler.logInfo(`Received ${signal}, starting graceful shutdown`);
      this.beginShutdown();

      const shutdownTimer = setTimeout(() => {
        this.errorHandler.logWarning('Graceful shutdown timeout reached, forcing exit');
        process.exit(EXIT_CODES.ERROR);
      }, TIMEOUTS.GRACEFUL_SHUTDOWN);

      // Give in-flight tool calls a moment to finish
      await new Promise(resolve => setTimeout(resolve, TIMEOUTS.SHUTDOWN_WAIT));
      clearTimeout(shutdownTimer);
      process.exit(EXIT_CODES.SUCCESS);
    };

    process.once('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.once('SIGINT', () => void gracefulShutdown('SIGINT'));
  }

  /**
   * Serve over stdio until the client disconnects
   */
  async start(): Promise<void> {
    const server = this.createServer();
    const transport = new StdioServerTransport();

    // A client that goes away mid-write surfaces as EPIPE
    process.on('uncaughtException', (error: Error) => {
      const systemError: NodeSystemError = error;
      if (systemError.code === 'EPIPE') {
        process.exit(EXIT_CODES.SUCCESS);
      }
      this.errorHandler.logError('Uncaught exception', error);
      process.exit(EXIT_CODES.ERROR);
    });

    transport.onclose = () => {
      process.exit(EXIT_CODES.SUCCESS);
    };

    transport.onerror = (error: Error) => {
      const systemError: NodeSystemError = error;
      if (systemError.code === 'EPIPE') {
        process.exit(EXIT_CODES.SUCCESS);
      }
      this.errorHandler.logError('Transport error', error);
    };

    this.setupGracefulShutdown();
    await server.connect(transport);
    this.errorHandler.logInfo(`${SERVER_INFO.DISPLAY_NAME} started on stdio`);
  }
}

export { PokeMCPServer };
