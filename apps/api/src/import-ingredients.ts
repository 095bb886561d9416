import { readFile } from "node:fs/promises";
import { close } from "./db.js";
import { importIngredients, parseIngredientCsv } from "./ingredient-import.js";

const csvFile = process.argv[2];

if (!csvFile) {
  console.error("Usage: import-ingredients <csv_file>");
  process.exitCode = 2;
} else {
  try {
    const ingredients = parseIngredientCsv(await readFile(csvFile, "utf-8"));
    console.log(`Importing ${ingredients.length} ingredient(s) from ${csvFile}…`);
    const summary = await importIngredients(ingredients);
    console.log(`Inserted ${summary.inserted}, skipped ${summary.skipped} already present.`);
  } catch (err) {
    console.error(err);
    process.exitCode = 1;
  } finally {
    await close();
  }
}
