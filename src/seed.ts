import seedData from "../data/seed.json";
import { loadConfig } from "./config/env";
import { connectDB, disconnectDB } from "./config/database";
import { parseFakeCount, seedStore } from "./services/seedService";
import { mongoStore } from "./store/mongoStore";

async function seed() {
  const config = loadConfig();
  await connectDB(config.MONGO_URI);

  try {
    const summary = await seedStore(
      mongoStore,
      seedData,
      parseFakeCount(process.argv.slice(2))
    );
    console.log(
      `Seeded ${summary.categories} categories and ${summary.questions} questions`
    );
  } finally {
    await disconnectDB();
  }
}

seed().catch((error) => {
  console.error("Error seeding database:", error);
  process.exit(1);
});
