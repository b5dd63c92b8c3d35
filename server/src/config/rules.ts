import { z } from 'zod';
import { VARIANTS, type GameRules, type VariantName } from '@indian-poker/shared';

const rankSchema = z.number().int().nonnegative();

const rulesSchema = z.object({
  variant: z.string().min(1),
  deck: z.object({
    ranks: z.array(rankSchema).min(2),
    copies: z.number().int().positive(),
  }),
  joker: z.object({ rank: rankSchema, beats: rankSchema }).nullable(),
  ante: z.number().int().positive(),
  startingStack: z.number().int().positive(),
  maxPlayers: z.number().int().min(2),
  foldPenalty: z.object({
    rank: rankSchema,
    fraction: z.number().min(0).max(1),
    rounding: z.enum(['up', 'down']),
  }).nullable(),
}).superRefine((rules, ctx) => {
  if (rules.startingStack < rules.ante) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['startingStack'], message: 'Starting stack must cover the ante' });
  }
  if (rules.joker && !rules.deck.ranks.includes(rules.joker.rank)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['joker', 'rank'], message: 'Joker rank is not in the deck' });
  }
});

export interface RuleOverrides {
  ante?: number;
  startingStack?: number;
  maxPlayers?: number;
}

/**
 * Table rules for a named variant with optional overrides, validated as a whole.
 * Throws a ZodError when the combination is unusable.
 */
export function buildRules(variant: VariantName, overrides: RuleOverrides = {}): GameRules {
  const preset = VARIANTS[variant];
  const candidate: GameRules = {
    ...preset,
    ante: overrides.ante ?? preset.ante,
    startingStack: overrides.startingStack ?? preset.startingStack,
    maxPlayers: overrides.maxPlayers ?? preset.maxPlayers,
  };
  return rulesSchema.parse(candidate);
}
