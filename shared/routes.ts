import { z } from "zod";
import { ATTENDANCE_STATUSES, COLOR_NAMES, RATE_TIERS, STAFF_TYPES, reportSettingsSchema, rosterEntrySchema } from "./schema";

export const errorSchemas = {
  validation: z.object({
    message: z.string(),
    field: z.string().optional(),
  }),
  notFound: z.object({
    message: z.string(),
  }),
  unclassifiedStaff: z.object({
    message: z.string(),
    employeeName: z.string(),
    unclassifiedNames: z.array(z.string()),
  }),
  unprocessable: z.object({
    message: z.string(),
    reason: z.string().optional(),
    missingMarkers: z.array(z.string()).optional(),
  }),
  internal: z.object({
    message: z.string(),
  }),
};

export const staffSchema = z.object({
  name: z.string(),
  staffType: z.enum(STAFF_TYPES),
  workWeekdays: z.array(z.number().int()),
});

const cellEmphasisSchema = z.object({
  color: z.enum(COLOR_NAMES).exclude(["none"]).nullable(),
  text: z.string().nullable(),
});

const recordViewSchema = z.object({
  date: z.string(),
  checkIn: z.string().nullable(),
  checkOut: z.string().nullable(),
  status: z.enum(ATTENDANCE_STATUSES),
  remark: z.string(),
  checkInEmphasis: cellEmphasisSchema,
  checkOutEmphasis: cellEmphasisSchema,
});

const staffReportSchema = z.object({
  staff: staffSchema,
  year: z.number().int(),
  month: z.number().int(),
  records: z.array(recordViewSchema),
  requiredDays: z.number().int(),
  actualDays: z.number().int(),
  attendanceRate: z.number(),
  rateTier: z.enum(RATE_TIERS),
  remarkSummary: z.string(),
});

export const reportResponseSchema = z.object({
  year: z.number().int(),
  month: z.number().int(),
  internal: z.array(staffReportSchema),
  external: z.array(staffReportSchema),
  holidays: z.array(z.string()),
  stats: z.object({
    year: z.number().int(),
    month: z.number().int(),
    requiredWorkDays: z.number().int(),
    holidayCount: z.number().int(),
    totalStaffCount: z.number().int(),
    internalCount: z.number().int(),
    externalCount: z.number().int(),
  }),
  warnings: z.array(z.object({ sheet: z.string(), row: z.number().int(), reason: z.string() })),
});

export const api = {
  reports: {
    generate: {
      method: "POST" as const,
      path: "/api/reports",
      input: z.object({
        fileName: z.string().trim().min(1, "fileName is required"),
        contentBase64: z.string().min(1, "contentBase64 is required"),
        settings: reportSettingsSchema.optional(),
      }),
      responses: {
        200: reportResponseSchema,
        400: errorSchemas.validation,
        409: errorSchemas.unclassifiedStaff,
        422: errorSchemas.unprocessable,
      },
    },
    names: {
      method: "POST" as const,
      path: "/api/reports/names",
      input: z.object({
        contentBase64: z.string().min(1, "contentBase64 is required"),
      }),
      responses: {
        200: z.object({ names: z.array(z.string()) }),
        400: errorSchemas.validation,
      },
    },
  },
  staff: {
    list: {
      method: "GET" as const,
      path: "/api/staff",
      responses: {
        200: z.array(staffSchema),
      },
    },
    get: {
      method: "GET" as const,
      path: "/api/staff/:name",
      responses: {
        200: staffSchema,
        404: errorSchemas.notFound,
      },
    },
    create: {
      method: "POST" as const,
      path: "/api/staff",
      input: rosterEntrySchema,
      responses: {
        201: staffSchema,
        400: errorSchemas.validation,
      },
    },
  },
};
