/**
 * agentTools.ts
 *
 * Tool definitions and executors for the travel assistant agent. Each tool
 * wraps one engine-backed service; results and failures are both returned
 * as JSON strings so they can be fed straight back to the model.
 */

import type { ChatCompletionTool } from "openai/resources/chat/completions";
import { z } from "zod";
import { ValidationError, errorMessage, isEngineError } from "../engine";
import type { RecommendationService } from "./recommendationService";
import type { WeatherClient } from "./weatherApi";
import type { FlightClient } from "./flightApi";
import type { EventsClient } from "./eventsApi";
import type { TransportClient } from "./transportService";
import { extractGuestsAndNights, mapLandmarkToCity, mapToDayType } from "./travelText";

export interface ToolExecutionContext {
  recommendations: RecommendationService;
  weather: WeatherClient;
  flights: FlightClient;
  events: EventsClient;
  transport: TransportClient;
}

// ============================================================================
// TOOL DEFINITIONS (OpenAI Function Calling Format)
// ============================================================================

export const TRAVEL_AGENT_TOOLS: ChatCompletionTool[] = [
  {
    type: "function",
    function: {
      name: "search_flights",
      description: "Search flight offers between two cities on a date. Returns up to 5 offers with price, airline and times.",
      parameters: {
        type: "object",
        properties: {
          origin_city: { type: "string", description: "Departure city (e.g., 'Jakarta'). Defaults to CGK when unknown." },
          destination_city: { type: "string", description: "Arrival city (e.g., 'Paris')" },
          date: { type: "string", description: "Departure date in YYYY-MM-DD format" },
        },
        required: ["destination_city", "date"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "get_weather_forecast",
      description: "Daily weather digest for a city on a date within the next five days.",
      parameters: {
        type: "object",
        properties: {
          city: { type: "string", description: "City name" },
          date: { type: "string", description: "Date in YYYY-MM-DD format" },
        },
        required: ["city", "date"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "search_transportation",
      description: "Public transport hubs (stations, metro, airports) in a city.",
      parameters: {
        type: "object",
        properties: {
          city: { type: "string", description: "City name" },
        },
        required: ["city"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "search_events",
      description: "Ticketed events in a city, optionally from a start date.",
      parameters: {
        type: "object",
        properties: {
          city: { type: "string", description: "City name" },
          date: { type: "string", description: "Start date in YYYY-MM-DD format" },
        },
        required: ["city"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "search_lodging",
      description:
        "Best-rated lodging in a city. Accepts a day name or date to pick weekday or weekend prices. " +
        "The city, guest count and nights can also be read from a free-text request such as 'near the Eiffel Tower, 3 guests, 2 nights'.",
      parameters: {
        type: "object",
        properties: {
          city: { type: "string", description: "City name; may be omitted when the request names a landmark" },
          request: { type: "string", description: "The traveller's own words, in English or Indonesian" },
          day: { type: "string", description: "Day name or date, e.g. 'saturday' or '2026-05-02'" },
          guests: { type: "number", description: "Number of guests; overrides the count in the request" },
          limit: { type: "number", description: "Maximum number of listings (default 5)" },
        },
      },
    },
  },
  {
    type: "function",
    function: {
      name: "search_places",
      description: "Popular attractions in a city, best rated first.",
      parameters: {
        type: "object",
        properties: {
          city: { type: "string", description: "City name" },
          limit: { type: "number", description: "Maximum number of places (default 5)" },
        },
        required: ["city"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "recommend_near_place",
      description: "Lodging within walking distance of a named attraction, optionally filtered and sorted.",
      parameters: {
        type: "object",
        properties: {
          city: { type: "string", description: "City name; defaults to the city of a known landmark" },
          place_name: { type: "string", description: "Attraction name, e.g. 'Eiffel Tower'" },
          max_distance_km: { type: "number", description: "Search radius in km (default 2)" },
          room_type: { type: "string", description: "Room type filter, e.g. 'entire'" },
          sort_key: { type: "string", description: "Field to sort by, e.g. 'price'" },
          guests: { type: "number", description: "Number of guests the listing must hold" },
          limit: { type: "number", description: "Maximum number of listings (default 5)" },
        },
        required: ["place_name"],
      },
    },
  },
];

// ============================================================================
// ARGUMENT SCHEMAS
// ============================================================================

const limitSchema = z.number().int().min(0).max(50).optional();
const guestsSchema = z.number().int().positive().optional();

const toolArgSchemas = {
  search_flights: z.object({
    origin_city: z.string().optional(),
    destination_city: z.string().min(1),
    date: z.string().min(1),
  }),
  get_weather_forecast: z.object({ city: z.string().min(1), date: z.string().min(1) }),
  search_transportation: z.object({ city: z.string().min(1) }),
  search_events: z.object({ city: z.string().min(1), date: z.string().optional() }),
  search_lodging: z
    .object({
      city: z.string().min(1).optional(),
      request: z.string().optional(),
      day: z.string().optional(),
      guests: guestsSchema,
      limit: limitSchema,
    })
    .refine((a) => a.city !== undefined || a.request !== undefined, {
      message: "city or request is required",
      path: ["city"],
    }),
  search_places: z.object({ city: z.string().min(1), limit: limitSchema }),
  recommend_near_place: z.object({
    city: z.string().min(1).optional(),
    place_name: z.string().min(1),
    max_distance_km: z.number().nonnegative().optional(),
    room_type: z.string().optional(),
    sort_key: z.string().optional(),
    guests: guestsSchema,
    limit: limitSchema,
  }),
};

export type TravelToolName = keyof typeof toolArgSchemas;

function isToolName(name: string): name is TravelToolName {
  return Object.prototype.hasOwnProperty.call(toolArgSchemas, name);
}

// ============================================================================
// EXECUTORS
// ============================================================================

/** The given city, else the city of a landmark named in the text. */
function resolveCity(city: string | undefined, text: string | undefined): string {
  const resolved = city ?? mapLandmarkToCity(text);
  if (!resolved) {
    throw new ValidationError("No city given and no known landmark in the request");
  }
  return resolved;
}

async function runTool(name: TravelToolName, args: unknown, ctx: ToolExecutionContext): Promise<unknown> {
  switch (name) {
    case "search_flights": {
      const a = toolArgSchemas.search_flights.parse(args);
      return ctx.flights.searchFlights(a.origin_city ?? null, a.destination_city, a.date);
    }
    case "get_weather_forecast": {
      const a = toolArgSchemas.get_weather_forecast.parse(args);
      const forecast = await ctx.weather.getForecast(a.city, a.date);
      return forecast ?? { error: `No forecast data available for ${a.city} on ${a.date}` };
    }
    case "search_transportation": {
      const a = toolArgSchemas.search_transportation.parse(args);
      return ctx.transport.getTransportation(a.city);
    }
    case "search_events": {
      const a = toolArgSchemas.search_events.parse(args);
      return ctx.events.getEvents(a.city, a.date);
    }
    case "search_lodging": {
      const a = toolArgSchemas.search_lodging.parse(args);
      const city = resolveCity(a.city, a.request);
      const stay = extractGuestsAndNights(a.request);
      const guests = a.guests ?? stay.guests;
      const dayType = mapToDayType(a.day);
      const items = await ctx.recommendations.recommendDefault({
        city,
        dayType: dayType ?? undefined,
        guests,
        topN: a.limit,
      });
      return { city, dayType, guests, nights: stay.nights, items };
    }
    case "search_places": {
      const a = toolArgSchemas.search_places.parse(args);
      return ctx.recommendations.recommendPlaces(a.city, a.limit);
    }
    case "recommend_near_place": {
      const a = toolArgSchemas.recommend_near_place.parse(args);
      return ctx.recommendations.recommendNearPlace({
        city: resolveCity(a.city, a.place_name),
        placeName: a.place_name,
        maxDistanceKm: a.max_distance_km,
        filters: a.room_type ? { roomType: a.room_type } : undefined,
        sortKey: a.sort_key,
        guests: a.guests,
        topN: a.limit,
      });
    }
  }
}

/**
 * Execute a tool call by name. Never throws: unknown tools, invalid
 * arguments and service failures all come back as `{ error, tool }` JSON.
 */
export async function executeToolCall(
  toolName: string,
  args: unknown,
  context: ToolExecutionContext
): Promise<string> {
  console.log(`[AgentTools] Executing tool: ${toolName}`);

  if (!isToolName(toolName)) {
    return JSON.stringify({ error: `Unknown tool: ${toolName}` });
  }

  try {
    const result = await runTool(toolName, args, context);
    return JSON.stringify(result);
  } catch (error) {
    if (error instanceof z.ZodError) {
      return JSON.stringify({
        error: "Invalid tool arguments",
        tool: toolName,
        details: error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    console.error(`[AgentTools] Tool ${toolName} failed:`, errorMessage(error));
    return JSON.stringify({
      error: errorMessage(error) || "Tool execution failed",
      tool: toolName,
      ...(isEngineError(error) ? { code: error.code } : {}),
    });
  }
}
