import { createApp } from "./app";
import { sealFrameworks } from "./frameworks";
import { settings } from "./lib/config";

const app = createApp();

if (process.env.NODE_ENV !== "test") {
  sealFrameworks();
  app.listen(settings.port, () => {
    console.log(`CRUD demo listening on http://localhost:${settings.port}`);
  });
}

export { app };
