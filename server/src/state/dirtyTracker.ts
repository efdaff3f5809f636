import type { FacilityId } from '@/types/tais'

/** Facilities touched since the last broadcast cycle. */
export class DirtyTracker {
  private dirty = new Set<FacilityId>()

  markDirty = (facility: FacilityId) => {
    this.dirty.add(facility)
  }

  drainDirty = (): FacilityId[] => {
    const drained = Array.from(this.dirty)
    this.dirty.clear()
    return drained
  }

  get size() {
    return this.dirty.size
  }
}
