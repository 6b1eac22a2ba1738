import { uniqueArtists } from "../services/provider";
import type { Track } from "../services/types";
import type { KnownArtistsView, RuleContext } from "./types";

export type RuleContextInput = {
  track: Track;
  knownArtists: KnownArtistsView;
  skipKnownArtists: boolean;
  now?: Date;
};

export function buildRuleContext(input: RuleContextInput): RuleContext {
  const artists = Object.freeze(uniqueArtists(input.track.artists));
  const knownInTrack = artists.filter((artist) => input.knownArtists.contains(artist.id));
  const unknownArtists = artists.filter((artist) => !input.knownArtists.contains(artist.id));

  return Object.freeze({
    track: input.track,
    artists,
    artistCount: artists.length,
    knownArtists: input.knownArtists,
    knownInTrack: Object.freeze(knownInTrack),
    unknownArtists: Object.freeze(unknownArtists),
    skipKnownArtists: input.skipKnownArtists,
    now: input.now ?? new Date(),
  });
}
