// Shared by the JSON API and the HTML form.
export const MAX_NAME_LENGTH = 100;
export const MAX_CODE_LENGTH = 200_000;
