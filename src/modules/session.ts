import { DEFAULTS, PERCENT_DENOMINATOR } from '../config';
import { ValidationError } from '../errors';
import { Recomputation, SessionState } from '../types/session';
import { SessionStateSchema } from '../utils/validation';
import { makePoolState } from './pool';
import { computeTrade } from './trade';

/**
 * Create a session from the defaults, applying any overrides.
 *
 * @throws ValidationError if an override breaks a field's range
 */
export function createSessionState(
  overrides: Partial<SessionState> = {},
): SessionState {
  const provided = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const parsed = SessionStateSchema.strict().safeParse({
    initialLiquidity: DEFAULTS.initialLiquidity,
    initialPrice: DEFAULTS.initialPrice,
    finalPrice: DEFAULTS.finalPrice,
    feePercent: DEFAULTS.feePercent,
    centerPrice: DEFAULTS.centerPrice,
    decades: DEFAULTS.decades,
    ...provided,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'session';
    throw new ValidationError(`${field} ${issue?.message ?? 'is invalid'}`, {
      field,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Derive both pool states and the trade between them.
 *
 * The trade is a price move at constant liquidity: both states share
 * `initialLiquidity`.
 *
 * @throws InvalidArgumentError if the session holds out-of-range values
 */
export function recompute(session: SessionState): Recomputation {
  const initial = makePoolState(session.initialLiquidity, session.initialPrice);
  const final = makePoolState(session.initialLiquidity, session.finalPrice);
  const result = computeTrade(
    initial,
    final,
    session.feePercent / PERCENT_DENOMINATOR,
  );
  return { initial, final, result };
}
