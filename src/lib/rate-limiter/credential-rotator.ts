/**
 * Ordered credential rotation (primary first, then backups).
 *
 * Rotation only moves forward. Rotating away from the last credential marks
 * the rotator exhausted, which is terminal.
 */

export interface CredentialSet<C> {
  primary: C;
  backups?: readonly C[];
}

export type RotationResult<C> =
  | { status: "rotated"; credential: C; index: number; advanced: boolean }
  | { status: "exhausted" };

export interface CredentialRotator<C> {
  current: () => C;
  currentIndex: () => number;
  size: () => number;
  isExhausted: () => boolean;
  /** Advances to the next credential */
  rotate: () => RotationResult<C>;
  /**
   * Advances only if `index` is still the active credential. Callers that
   * observed a rate limit on a credential another caller already rotated
   * away from get the current credential back instead of skipping one.
   */
  rotateFrom: (index: number) => RotationResult<C>;
  /** The credential `rotate` would move to, undefined when none is left */
  peekNext: () => { credential: C; index: number } | undefined;
  /** Replaces the value stored at `index` (refreshed credential) */
  replace: (index: number, credential: C) => void;
}

export const createCredentialRotator = <C>(set: CredentialSet<C>): CredentialRotator<C> => {
  const credentials: C[] = [set.primary, ...(set.backups ?? [])];
  let activeIndex = 0;
  let exhausted = false;

  const rotate = (): RotationResult<C> => {
    if (exhausted || activeIndex + 1 >= credentials.length) {
      exhausted = true;
      return { status: "exhausted" };
    }
    activeIndex++;
    return {
      status: "rotated",
      credential: credentials[activeIndex],
      index: activeIndex,
      advanced: true,
    };
  };

  const rotateFrom = (index: number): RotationResult<C> => {
    if (index < activeIndex && !exhausted) {
      return {
        status: "rotated",
        credential: credentials[activeIndex],
        index: activeIndex,
        advanced: false,
      };
    }
    return rotate();
  };

  const peekNext = (): { credential: C; index: number } | undefined => {
    const index = activeIndex + 1;
    return exhausted || index >= credentials.length
      ? undefined
      : { credential: credentials[index], index };
  };

  const replace = (index: number, credential: C): void => {
    if (index < 0 || index >= credentials.length) {
      throw new RangeError(`Credential index ${index} out of range`);
    }
    credentials[index] = credential;
  };

  return {
    current: () => credentials[activeIndex],
    currentIndex: () => activeIndex,
    size: () => credentials.length,
    isExhausted: () => exhausted,
    rotate,
    rotateFrom,
    peekNext,
    replace,
  };
};
