import {
  listings,
  places,
  itineraries,
  type Listing,
  type Place,
  type Itinerary,
  type InsertItinerary,
} from "@shared/schema";
import { z } from "zod";
import { and, desc, eq, sql } from "drizzle-orm";
import { db, type Database } from "./db";
import { readDataFile } from "./services/dataFiles";

export interface IStorage {
  // Lodging
  listListings(city: string, dayType?: string): Promise<Listing[]>;
  getListing(id: number): Promise<Listing | undefined>;

  // Points of interest
  listPlaces(city: string): Promise<Place[]>;

  // Itineraries
  saveItinerary(itinerary: InsertItinerary): Promise<Itinerary>;
  getLatestItinerary(userId: string): Promise<Itinerary | undefined>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly database: Database) {}

  async listListings(city: string, dayType?: string): Promise<Listing[]> {
    const cityMatch = eq(sql`lower(${listings.city})`, city.trim().toLowerCase());
    return this.database
      .select()
      .from(listings)
      .where(dayType ? and(cityMatch, eq(listings.dayType, dayType)) : cityMatch)
      .orderBy(listings.id);
  }

  async getListing(id: number): Promise<Listing | undefined> {
    const [listing] = await this.database.select().from(listings).where(eq(listings.id, id));
    return listing;
  }

  async listPlaces(city: string): Promise<Place[]> {
    return this.database
      .select()
      .from(places)
      .where(eq(sql`lower(${places.city})`, city.trim().toLowerCase()))
      .orderBy(places.id);
  }

  async saveItinerary(itinerary: InsertItinerary): Promise<Itinerary> {
    const [saved] = await this.database.insert(itineraries).values(itinerary).returning();
    return saved;
  }

  async getLatestItinerary(userId: string): Promise<Itinerary | undefined> {
    const [latest] = await this.database
      .select()
      .from(itineraries)
      .where(eq(itineraries.userId, userId))
      .orderBy(desc(itineraries.createdAt), desc(itineraries.id))
      .limit(1);
    return latest;
  }
}

// ============================================================================
// IN-MEMORY STORAGE
// ============================================================================

const nullableText = z.string().nullable().default(null);
const nullableNumber = z.number().nullable().default(null);
const nullableInt = z.number().int().nullable().default(null);
const nullableBool = z.boolean().nullable().default(null);

const seedListingSchema = z.object({
  id: z.number().int().positive(),
  name: nullableText,
  city: z.string().min(1),
  dayType: nullableText,
  roomType: nullableText,
  roomShared: nullableBool,
  personCapacity: nullableInt,
  bedrooms: nullableInt,
  hostIsSuperhost: nullableBool,
  price: nullableNumber,
  overallRating: nullableNumber,
  reputationScore: nullableNumber,
  cleanliness: nullableNumber,
  walkScore: nullableNumber,
  distanceToCityCenter: nullableNumber,
  distanceToMetro: nullableNumber,
  nearbyAttractions: nullableNumber,
  latitude: nullableNumber,
  longitude: nullableNumber,
}) satisfies z.ZodType<Listing, z.ZodTypeDef, unknown>;

const seedPlaceSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  category: z.string().nullable().default("attraction"),
  city: z.string().min(1),
  rating: nullableNumber,
  ticketPrice: nullableNumber,
  latitude: nullableNumber,
  longitude: nullableNumber,
}) satisfies z.ZodType<Place, z.ZodTypeDef, unknown>;

export interface MemStorageSeed {
  listings?: Listing[];
  places?: Place[];
}

export function loadSampleData(): Required<MemStorageSeed> {
  return {
    listings: readDataFile("sample-listings.json", z.array(seedListingSchema)),
    places: readDataFile("sample-places.json", z.array(seedPlaceSchema)),
  };
}

const sameCity = (a: string, b: string) => a.trim().toLowerCase() === b.trim().toLowerCase();

// Keeps everything in memory. Used when no DATABASE_URL is configured and in tests.
export class MemStorage implements IStorage {
  private readonly listings: Listing[];
  private readonly places: Place[];
  private itineraries: Itinerary[] = [];
  private nextItineraryId = 1;

  constructor(seed: MemStorageSeed = {}) {
    this.listings = [...(seed.listings ?? [])];
    this.places = [...(seed.places ?? [])];
  }

  async listListings(city: string, dayType?: string): Promise<Listing[]> {
    return this.listings.filter(
      (l) => sameCity(l.city, city) && (!dayType || l.dayType === dayType)
    );
  }

  async getListing(id: number): Promise<Listing | undefined> {
    return this.listings.find((l) => l.id === id);
  }

  async listPlaces(city: string): Promise<Place[]> {
    return this.places.filter((p) => sameCity(p.city, city));
  }

  async saveItinerary(itinerary: InsertItinerary): Promise<Itinerary> {
    const saved: Itinerary = {
      id: this.nextItineraryId++,
      userId: itinerary.userId,
      destination: itinerary.destination,
      itinerary: itinerary.itinerary,
      createdAt: new Date(),
    };
    this.itineraries.push(saved);
    return saved;
  }

  async getLatestItinerary(userId: string): Promise<Itinerary | undefined> {
    // Later saves win ties on createdAt
    let latest: Itinerary | undefined;
    for (const entry of this.itineraries) {
      if (entry.userId !== userId) continue;
      if (!latest || (entry.createdAt?.getTime() ?? 0) >= (latest.createdAt?.getTime() ?? 0)) {
        latest = entry;
      }
    }
    return latest;
  }
}

export const storage: IStorage = db ? new DatabaseStorage(db) : new MemStorage(loadSampleData());
