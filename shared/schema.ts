import { pgTable, text, serial, integer, boolean, timestamp, real, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================================================
// LODGING LISTINGS
// ============================================================================

export const listings = pgTable("listings", {
  id: serial("id").primaryKey(),
  name: text("name"),
  city: text("city").notNull(),
  dayType: text("day_type"), // 'weekdays' | 'weekends'

  roomType: text("room_type"),
  roomShared: boolean("room_shared"),
  personCapacity: integer("person_capacity"),
  bedrooms: integer("bedrooms"),
  hostIsSuperhost: boolean("host_is_superhost"),
  price: real("price"), // per night

  // Quality metrics (higher is better)
  overallRating: real("overall_rating"),
  reputationScore: real("reputation_score"),
  cleanliness: real("cleanliness"),
  walkScore: real("walk_score"),

  // Distance-type metrics (lower is better)
  distanceToCityCenter: real("distance_to_city_center"), // km
  distanceToMetro: real("distance_to_metro"), // km
  nearbyAttractions: real("nearby_attractions"),

  latitude: real("latitude"),
  longitude: real("longitude"),
}, (table) => ({
  cityIdx: index("listings_city_idx").on(table.city),
}));

// ============================================================================
// POINTS OF INTEREST
// ============================================================================

export const places = pgTable("places", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  category: text("category").default("attraction"),
  city: text("city").notNull(),
  rating: real("rating"),
  ticketPrice: real("ticket_price"),
  latitude: real("latitude"),
  longitude: real("longitude"),
}, (table) => ({
  cityIdx: index("places_city_idx").on(table.city),
}));

// ============================================================================
// SAVED ITINERARIES
// ============================================================================

export const itineraries = pgTable("itineraries", {
  id: serial("id").primaryKey(),
  userId: text("user_id").notNull(),
  destination: text("destination").notNull(),
  itinerary: text("itinerary").notNull(),
  createdAt: timestamp("created_at").defaultNow(),
}, (table) => ({
  userIdx: index("itineraries_user_idx").on(table.userId),
}));

// ============================================================================
// ZOD SCHEMAS FOR VALIDATION
// ============================================================================

export const insertItinerarySchema = createInsertSchema(itineraries).omit({
  id: true,
  createdAt: true,
});

export type Listing = typeof listings.$inferSelect;
export type Place = typeof places.$inferSelect;
export type Itinerary = typeof itineraries.$inferSelect;
export type InsertItinerary = z.infer<typeof insertItinerarySchema>;

// ============================================================================
// API REQUEST SCHEMAS
// ============================================================================

export const geoPointSchema = z.object({
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
});

export const filterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const dayTypeSchema = z.enum(["weekdays", "weekends"]);

const topNSchema = z.coerce.number().int().min(0).max(50).default(5);
const guestsSchema = z.coerce.number().int().positive().optional();

export const defaultRecommendationSchema = z.object({
  city: z.string().min(1, "City is required"),
  dayType: dayTypeSchema.optional(),
  guests: guestsSchema,
  topN: topNSchema,
});

export const preferenceRecommendationSchema = z.object({
  city: z.string().min(1, "City is required"),
  dayType: dayTypeSchema.optional(),
  guests: guestsSchema,
  filters: z.record(filterValueSchema).default({}),
  sortKey: z.string().min(1).optional(),
  topN: topNSchema,
});

export const nearPlaceRecommendationSchema = preferenceRecommendationSchema
  .extend({
    placeName: z.string().min(1).optional(),
    point: geoPointSchema.optional(),
    maxDistanceKm: z.coerce.number().nonnegative().optional(),
  })
  .refine((body) => body.placeName !== undefined || body.point !== undefined, {
    message: "Either placeName or point is required",
  });

export const nearbyPlacesSchema = z.object({
  city: z.string().min(1, "City is required"),
  listingId: z.coerce.number().int().positive().optional(),
  latitude: z.coerce.number().min(-90).max(90).optional(),
  longitude: z.coerce.number().min(-180).max(180).optional(),
  maxDistanceKm: z.coerce.number().nonnegative().default(2),
  limit: z.coerce.number().int().min(0).max(50).default(5),
});

