/** Audio-feature tunables sent to /recommendations for each named mood. */
export const MOOD_TUNABLES = {
  happy: { target_valence: 0.8, target_energy: 0.7, min_danceability: 0.5 },
  sad: { target_valence: 0.2, max_energy: 0.5, max_danceability: 0.5 },
  energetic: { min_energy: 0.7, target_tempo: 120, target_valence: 0.7 },
  calm: { target_energy: 0.3, target_acousticness: 0.7, max_tempo: 100 },
  focus: {
    target_instrumentalness: 0.7,
    max_speechiness: 0.3,
    min_acousticness: 0.5,
    target_energy: 0.3,
  },
  party: { target_danceability: 0.9, target_energy: 0.9, min_popularity: 50 },
  relax: { max_energy: 0.4, target_acousticness: 0.6, target_valence: 0.5 },
  sleep: {
    max_energy: 0.2,
    max_loudness: -20,
    target_instrumentalness: 0.8,
    target_acousticness: 0.8,
  },
  workout: { min_energy: 0.7, min_tempo: 130, target_danceability: 0.6 },
  romantic: {
    target_valence: 0.6,
    target_acousticness: 0.5,
    max_tempo: 120,
    min_speechiness: 0.1,
    max_speechiness: 0.4,
  },
  studying: {
    target_instrumentalness: 0.6,
    max_energy: 0.4,
    max_valence: 0.5,
    min_acousticness: 0.4,
  },
  upbeat: { target_energy: 0.8, min_tempo: 120, target_danceability: 0.7 },
  mellow: { target_energy: 0.4, target_valence: 0.4, target_acousticness: 0.6 },
} as const satisfies Record<string, Record<string, number>>;

export type Mood = keyof typeof MOOD_TUNABLES;

export const MOODS = Object.keys(MOOD_TUNABLES).sort();

export function isMood(value: string): value is Mood {
  return Object.hasOwn(MOOD_TUNABLES, value);
}

const TUNABLE_FEATURES = [
  'acousticness',
  'danceability',
  'duration_ms',
  'energy',
  'instrumentalness',
  'key',
  'liveness',
  'loudness',
  'mode',
  'popularity',
  'speechiness',
  'tempo',
  'time_signature',
  'valence',
];

const TUNABLE_KEY = new RegExp(`^(min|max|target)_(${TUNABLE_FEATURES.join('|')})$`);

export function isTunableKey(key: string): boolean {
  return TUNABLE_KEY.test(key);
}
