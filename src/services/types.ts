export interface Artist {
  id: string;
  name: string;
}

export interface Track {
  id: string;
  title: string;
  artists: Artist[];
  /** When the listener liked the track; null for tracks outside the library. */
  likedAt: Date | null;
}

export interface PlaybackState {
  isPlaying: boolean;
  deviceName: string | null;
  trackTitle: string | null;
}
