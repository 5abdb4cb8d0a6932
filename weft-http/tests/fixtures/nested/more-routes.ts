import type { Router } from "../../../src/index.js";

export const moreRoutes: Router = {
  route(router) {
    router.get("/nested/3", (_req, res) => {
      res.send("From3");
    });
  },
  openApi: {
    "/nested/3": {
      get: { responses: { "200": { description: "Nested greeting" } } },
    },
  },
};

export const notARouter = { route: "/nested/3" };
