import { z } from 'zod';
import { rosterSchema, type AssignmentReport } from './schema';

// ============================================
// SHARED ERROR SCHEMAS
// ============================================
export const errorSchemas = {
  validation: z.object({
    message: z.string(),
    field: z.string().optional(),
  }),
  internal: z.object({
    message: z.string(),
  }),
};

// ============================================
// API CONTRACT
// ============================================
export const api = {
  health: {
    method: 'GET' as const,
    path: '/api/health',
    responses: {
      200: z.object({ ok: z.literal(true) }),
    },
  },

  schedule: {
    assign: {
      method: 'POST' as const,
      path: '/api/schedule/assign',
      input: rosterSchema,
      responses: {
        200: z.custom<AssignmentReport>(),
        400: errorSchemas.validation,
      },
    },
    render: {
      method: 'POST' as const,
      path: '/api/schedule/render',
      input: rosterSchema,
      responses: {
        200: z.string(), // text/plain
        400: errorSchemas.validation,
      },
    },
  },
};
