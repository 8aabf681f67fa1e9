// ============================================================================
// POLITIQUE D'ENTRETIEN
// Tous les seuils utilisés par le planner et l'orchestrateur sont ici ;
// le moteur ne contient pas de nombre magique.
// ============================================================================

export const INTERVIEW_POLICY = {
  PROTOCOL: {
    WINDOW_SIZE: 2,
    RESCUE_MAX_SCORE: 3,
    SPEEDRUN_MIN_SCORE: 8,
    STANDARD_BAND: { MIN: 4, MAX: 7 },
    // Score substitué quand l'évaluation technique est indisponible
    NEUTRAL_SCORE: 5,
  },

  GENERATION: {
    // 1 tentative + 1 retry avec la même directive
    MAX_ATTEMPTS: 2,
    HISTORY_TURNS: 6,
  },

  PLAN: {
    MAX_TOPICS: 8,
  },

  REPORT: {
    CONFIRMED_SKILL_SCORE: 7,
  },

  // Provider heuristique (mode hors-ligne) : mots-clés + bonus de longueur
  HEURISTIC_SCORING: {
    BASE_SCORE: 4,
    KEYWORD_MATCH_VALUE: 2,
    LENGTH_THRESHOLD_CHARS: 50,
    LENGTH_BONUS: 1,
    // jamais de score parfait sans modèle
    MAX_SCORE: 8,
    DEEP_ANSWER_CHARS: 200,
  },
} as const;

export const DEGRADED_MARKER = '[DEGRADED] technical evaluation unavailable; neutral score 5 substituted';

// Préfixe des notes produites par un repli (classification, plan)
export const FALLBACK_MARKER = '[FALLBACK]';
