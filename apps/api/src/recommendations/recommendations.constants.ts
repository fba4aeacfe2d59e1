export const NO_MATCHES_MESSAGE =
  "I couldn't find any matches. Try a broader search.";

export const FALLBACK_REASONING =
  'Here are the most relevant movies from our database.';

export const DEFAULT_ITEM_REASONING = 'Recommended based on your preferences.';

export const PER_ITEM_SUMMARY =
  'Each pick below comes with a note on why it fits your request.';
