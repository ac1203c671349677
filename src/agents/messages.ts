export const CLOSING_MESSAGE = 'Session complete. Happy driving!';

export const MAX_ITERATIONS_MESSAGE =
  "I've reached the maximum number of planning iterations. Please try rephrasing your question if you need more help.";

export const APOLOGY_MESSAGE = 'Sorry, I encountered an error processing your request. Please try again.';
