import { z } from 'zod';

// ─── Reusable Zod refinements ────────────────────────────

/** ISO-8601 datetime string */
export const zISOTimestamp = z.string().datetime({ offset: true }).or(z.string().datetime());
