// backend/services/user/src/controllers/handlers/messages.ts
// Client-facing texts for request-shape failures (caught before the service).
export const MSG_BAD_ID = "Invalid user id";
export const MSG_BAD_BODY = "Invalid request body";
