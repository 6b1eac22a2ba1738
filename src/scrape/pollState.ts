import type { Track } from "../services/types";

/**
 * Last-seen like marker. Only ever moves forward.
 *
 * Like timestamps can be as coarse as one second, so the IDs already seen
 * at the marker instant are kept too: a like that lands in the same second
 * after a poll is still new.
 */
export class PollState {
  private marker: Date | null;
  private readonly seenAtMarker = new Set<string>();

  constructor(initial: Date | null = null) {
    this.marker = initial;
  }

  get lastSeen(): Date | null {
    return this.marker;
  }

  /** Returns true when the marker moved. */
  advance(to: Date | null): boolean {
    if (!to) return false;
    if (this.marker && to.getTime() <= this.marker.getTime()) return false;
    this.marker = to;
    this.seenAtMarker.clear();
    return true;
  }

  isUnseen(track: Track): boolean {
    if (!track.likedAt) return false;
    if (!this.marker) return true;
    const liked = track.likedAt.getTime();
    const marker = this.marker.getTime();
    if (liked !== marker) return liked > marker;
    return !this.seenAtMarker.has(track.id);
  }

  /**
   * Advance to the newest of `tracks` and remember which of them sit on
   * the marker instant. Returns true when the marker moved.
   */
  record(tracks: readonly Track[]): boolean {
    let newest: Date | null = null;
    for (const track of tracks) {
      if (track.likedAt && (!newest || track.likedAt.getTime() > newest.getTime())) {
        newest = track.likedAt;
      }
    }
    const moved = this.advance(newest);
    const marker = this.marker;
    if (!marker) return moved;
    for (const track of tracks) {
      if (track.likedAt && track.likedAt.getTime() === marker.getTime()) {
        this.seenAtMarker.add(track.id);
      }
    }
    return moved;
  }
}
