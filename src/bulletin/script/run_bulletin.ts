// Load envs from .env
// npm run bulletin -- --dry-run
import "dotenv/config";
import { createBulletinEngine } from "../application/bulletin_engine";
import { loadBulletinConfig } from "../config";

async function main() {
  const dryRun = process.argv.includes("--dry-run");
  const engine = createBulletinEngine(loadBulletinConfig());

  if (dryRun) {
    const built = await engine.build();
    // eslint-disable-next-line no-console
    console.log(built.message);
    return;
  }

  const result = await engine.run();
  if (!result.delivery.ok) {
    // eslint-disable-next-line no-console
    console.error(`Delivery failed: ${result.delivery.error.message}`);
  }
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
