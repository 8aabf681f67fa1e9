import { z } from 'zod';
import { INTENTS } from '../types/interview.js';
import { ACCURACY_LEVELS, DEMEANORS, DEPTH_LEVELS, LEVELS } from '../types/evaluation.js';
import { TOPIC_DIFFICULTIES } from '../types/topic.js';
import { ASSESSED_LEVELS, RECOMMENDATIONS } from '../types/report.js';

// ============================================
// SCHÉMAS DE SORTIE DES AGENTS
// ============================================
// Toute sortie du provider d'inférence passe par ces schémas avant
// d'atteindre le cœur. Un champ hors borne = sortie invalide.

export const RouterOutputSchema = z.object({
  intent: z.enum(INTENTS),
  thought: z.string().default(''),
});
export type RouterOutput = z.infer<typeof RouterOutputSchema>;

export const TechnicalOutputSchema = z.object({
  score: z.number().int().min(0).max(10),
  accuracy: z.enum(ACCURACY_LEVELS),
  depth: z.enum(DEPTH_LEVELS),
  thought: z.string().min(1),
  issues: z.array(z.string()).max(3).default([]),
  correctAnswer: z.string().nullable().default(null),
  contradictionDetected: z.boolean().default(false),
  fictionalTermDetected: z.boolean().default(false),
});
export type TechnicalOutput = z.infer<typeof TechnicalOutputSchema>;

export const BehavioralOutputSchema = z.object({
  clarity: z.number().int().min(1).max(10),
  honesty: z.number().int().min(1).max(10),
  engagement: z.enum(LEVELS),
  stressLevel: z.enum(LEVELS),
  demeanor: z.enum(DEMEANORS).default('normal'),
  thought: z.string().min(1),
});
export type BehavioralOutput = z.infer<typeof BehavioralOutputSchema>;

export const VoiceOutputSchema = z.object({
  message: z.string().trim().min(1),
  thought: z.string().default(''),
});
export type VoiceOutput = z.infer<typeof VoiceOutputSchema>;

export const InterviewPlanOutputSchema = z.object({
  topics: z
    .array(
      z.object({
        label: z.string().trim().min(1),
        difficulty: z.enum(TOPIC_DIFFICULTIES),
        rationale: z.string().default(''),
      }),
    )
    .min(1),
  thought: z.string().default(''),
});
export type InterviewPlanOutput = z.infer<typeof InterviewPlanOutputSchema>;

export const ReporterOutputSchema = z.object({
  level: z.enum(ASSESSED_LEVELS),
  recommendation: z.enum(RECOMMENDATIONS),
  confidence: z.number().int().min(0).max(100),
  reasoning: z.string().min(1),
  clarity: z.number().int().min(1).max(10),
  honesty: z.number().int().min(1).max(10),
  engagement: z.number().int().min(1).max(10),
  softSkillsNotes: z.string().default(''),
  roadmap: z.array(z.string()).default([]),
  resources: z.array(z.string()).default([]),
  thought: z.string().default(''),
});
export type ReporterOutput = z.infer<typeof ReporterOutputSchema>;
