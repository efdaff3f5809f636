export type GroundVector = {
  speedKts: number
  /** Null when the aircraft is not moving. */
  trackDeg: number | null
}

export const normalizeDeg = (deg: number) => {
  const wrapped = deg % 360
  return wrapped < 0 ? wrapped + 360 : wrapped
}

/**
 * Converts east/north velocity components (knots) into ground speed and
 * ground track. Track is measured clockwise from north.
 */
export const groundVectorFromVelocity = (vx: number, vy: number): GroundVector => {
  const speed = Math.hypot(vx, vy)
  if (speed <= 0) {
    return { speedKts: 0, trackDeg: null }
  }
  const heading = normalizeDeg((Math.atan2(vx, vy) * 180) / Math.PI)
  return {
    speedKts: Math.round(speed),
    trackDeg: Math.round(heading) % 360,
  }
}
