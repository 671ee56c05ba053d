/**
 * Zod Validation Schemas
 *
 * Structured values that cross the storage edge (profile extras, reflection
 * answers) are validated here on the way in from a wizard and again on the way
 * out of JSONB columns, so business logic never handles an untyped blob.
 *
 * Usage:
 *   const result = ReflectionAnswersSchema.safeParse(row.answers)
 *   if (!result.success) return null
 *   return result.data
 */

import { z } from 'zod'

// ═══════════════════════════════════════════════════════════════════════════
// 1. PROFILE
// ═══════════════════════════════════════════════════════════════════════════

export const FunnelTypeSchema = z.enum(['active', 'passive'])

export const SalarySchema = z.object({
  min: z.number().positive(),
  max: z.number().positive(),
  currency: z.string().min(1).max(10),
  period: z.enum(['month', 'year']),
}).refine(s => s.max >= s.min, { message: 'Maximum salary must not be below the minimum', path: ['max'] })

export type Salary = z.infer<typeof SalarySchema>

export const COMPANY_TYPES = ['smb', 'scaleup', 'enterprise', 'consulting'] as const

export const ProfileSchema = z.object({
  role: z.string().trim().min(1).max(100),
  currentLocation: z.string().trim().min(1).max(100),
  targetLocation: z.string().trim().min(1).max(100),
  level: z.string().trim().min(1).max(50),
  deadlineWeeks: z.number().int().min(1).max(52),
  targetEndDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  preferredFunnel: FunnelTypeSchema.default('active'),

  roleSynonyms: z.array(z.string().min(1)).max(4).optional(),
  salary: SalarySchema.optional(),
  companyTypes: z.array(z.string().min(1)).max(10).optional(),
  industries: z.array(z.string().min(1)).max(3).optional(),
  competencies: z.array(z.string().min(1)).max(10).optional(),
  superpowers: z.array(z.string().min(1)).min(3).max(5).optional(),
  constraints: z.string().max(500).optional(),
  linkedinUrl: z.string().url().optional(),
})

export type Profile = z.infer<typeof ProfileSchema>

/** Optional profile fields kept together in one JSONB column. */
export const ProfileExtrasSchema = ProfileSchema.pick({
  roleSynonyms: true,
  salary: true,
  companyTypes: true,
  industries: true,
  competencies: true,
  superpowers: true,
  constraints: true,
})

export type ProfileExtras = z.infer<typeof ProfileExtrasSchema>

// ═══════════════════════════════════════════════════════════════════════════
// 2. REFLECTION ANSWERS
// ═══════════════════════════════════════════════════════════════════════════

export const REJECTION_REASONS = ['skill', 'culture', 'location', 'language', 'salary', 'domain', 'timing', 'other'] as const
export const RejectionReasonSchema = z.enum(REJECTION_REASONS)
export type RejectionReason = z.infer<typeof RejectionReasonSchema>

export const REJECTION_POINTS = ['no_interview', 'after_recruiter', 'after_technical'] as const
export const RejectionPointSchema = z.enum(REJECTION_POINTS)
export type RejectionPoint = z.infer<typeof RejectionPointSchema>

const Rating = z.number().int().min(1).max(5)

export const StageAnswersSchema = z.object({
  kind: z.literal('stage'),
  rating: Rating,
  strengths: z.string().max(1000).optional(),
  weaknesses: z.string().max(1000).optional(),
  mood: Rating,
})

export const RejectionAnswersSchema = z.object({
  kind: z.literal('rejection'),
  rejectAfter: RejectionPointSchema,
  reasons: z.array(RejectionReasonSchema).min(1),
  reasonOther: z.string().min(1).max(500).optional(),
  mood: Rating,
}).refine(a => !a.reasons.includes('other') || a.reasonOther !== undefined, {
  message: 'Describe the other reason',
  path: ['reasonOther'],
})

export const ReflectionAnswersSchema = z.union([StageAnswersSchema, RejectionAnswersSchema])

export type StageAnswers = z.infer<typeof StageAnswersSchema>
export type RejectionAnswers = z.infer<typeof RejectionAnswersSchema>
export type ReflectionAnswers = z.infer<typeof ReflectionAnswersSchema>
