/**
 * Angle - Pure helpers for angle units and continuity
 */
export const Angle = {
  toRadians(degrees: number): number {
    return (degrees * Math.PI) / 180;
  },

  toDegrees(radians: number): number {
    return (radians * 180) / Math.PI;
  },

  /**
   * Remove 2π jumps from a sequence of angles.
   *
   * Whenever two consecutive samples differ by at least π, a multiple of
   * 2π is added to every later sample so that the step becomes the
   * equivalent one in [-π, π). A step of exactly +π is kept as +π.
   */
  unwrap(angles: readonly number[]): number[] {
    const out: number[] = [];
    let correction = 0;
    let previous: number | null = null;

    for (const angle of angles) {
      if (previous !== null) {
        const step = angle - previous;
        if (Math.abs(step) >= Math.PI) {
          let wrapped = mod(step + Math.PI, 2 * Math.PI) - Math.PI;
          if (wrapped === -Math.PI && step > 0) wrapped = Math.PI;
          correction += wrapped - step;
        }
      }
      out.push(angle + correction);
      previous = angle;
    }
    return out;
  },
};

/** Floored modulo, result has the sign of `m` */
function mod(x: number, m: number): number {
  return ((x % m) + m) % m;
}
