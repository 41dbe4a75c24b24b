import { setupServer } from "msw/node";
import { afterAll, afterEach, beforeAll } from "vitest";

/**
 * Every outbound HTTP call in the suite is answered in process. Test files register the
 * handlers they need with `server.use(...)`; anything unmatched fails the request.
 */
export const server = setupServer();

beforeAll(() => {
	server.listen({ onUnhandledRequest: "error" });
});

afterEach(() => {
	server.resetHandlers();
});

afterAll(() => {
	server.close();
});
