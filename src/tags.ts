export interface VorbisTag {
  key: string;
  value: string;
}

/** Vorbis comment field names mapped onto Nero Digital tag names. */
const NERO_FIELDS: Record<string, string> = {
  ARTIST: "artist",
  TITLE: "title",
  ALBUM: "album",
  DATE: "year",
  TRACKNUMBER: "track",
  GENRE: "genre",
  COMMENT: "comment",
  ORGANIZATION: "label",
  LICENSE: "credits",
  COPYRIGHT: "copyright",
  ISRC: "isrc",
  COMPOSER: "composer",
  TRACKTOTAL: "totaltracks",
  DISCNUMBER: "disc",
  DISCTOTAL: "totaldiscs",
};

/**
 * Parses `metaflac --export-tags-to=-` output. Field names are upper-cased;
 * lines without a `=` are ignored.
 */
export function parseVorbisComments(text: string): VorbisTag[] {
  const tags: VorbisTag[] = [];
  for (const line of text.split(/\r?\n/)) {
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    tags.push({ key: line.slice(0, eq).toUpperCase(), value: line.slice(eq + 1) });
  }
  return tags;
}

/**
 * Maps Vorbis comments to neroAacTag fields. The first value of a field wins,
 * VERSION is folded into the title, and track numbers lose leading zeros.
 * Fields with no Nero counterpart are dropped.
 */
export function toNeroTags(tags: readonly VorbisTag[]): VorbisTag[] {
  const first = new Map<string, string>();
  for (const tag of tags) {
    if (!first.has(tag.key)) first.set(tag.key, tag.value);
  }

  const version = first.get("VERSION");
  const title = first.get("TITLE");
  if (version !== undefined && title !== undefined) {
    first.set("TITLE", `${title} [${version}]`);
  }

  const track = first.get("TRACKNUMBER");
  if (track !== undefined && /^\d+$/.test(track.trim())) {
    first.set("TRACKNUMBER", String(parseInt(track, 10)));
  }

  const out: VorbisTag[] = [];
  for (const [vorbis, nero] of Object.entries(NERO_FIELDS)) {
    const value = first.get(vorbis);
    if (value !== undefined) out.push({ key: nero, value });
  }
  return out;
}
