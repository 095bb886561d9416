import { describe, expect, it } from "vitest";
import { attachmentDisposition, formatShoppingList, shoppingListFilename } from "../../src/shopping-list.js";

describe("shopping list", () => {
  it("prints one line per ingredient sorted by name", () => {
    const text = formatShoppingList([
      { name: "sugar", measurement_unit: "g", amount: 50 },
      { name: "eggs", measurement_unit: "pcs", amount: 3 },
      { name: "butter", measurement_unit: "g", amount: 120 },
    ]);

    expect(text).toBe(["- butter (g) - 120", "- eggs (pcs) - 3", "- sugar (g) - 50"].join("\n"));
  });

  it("keeps the same name in different units apart", () => {
    const text = formatShoppingList([
      { name: "milk", measurement_unit: "ml", amount: 200 },
      { name: "milk", measurement_unit: "cup", amount: 1 },
    ]);

    expect(text).toBe("- milk (cup) - 1\n- milk (ml) - 200");
  });

  it("names the file after the user", () => {
    expect(shoppingListFilename("reader")).toBe("reader_shopping_list.txt");
  });

  it("quotes an ASCII filename as is", () => {
    expect(attachmentDisposition("chef.anna@home_shopping_list.txt")).toBe(
      'attachment; filename="chef.anna@home_shopping_list.txt"',
    );
  });

  it("adds a UTF-8 filename* for names outside ASCII", () => {
    expect(attachmentDisposition("повар_shopping_list.txt")).toBe(
      "attachment; filename=\"______shopping_list.txt\"; " +
        "filename*=UTF-8''%D0%BF%D0%BE%D0%B2%D0%B0%D1%80_shopping_list.txt",
    );
  });

  it("encodes quote characters that encodeURIComponent leaves alone", () => {
    expect(attachmentDisposition("é'(x)*.txt")).toBe(
      "attachment; filename=\"_'(x)*.txt\"; filename*=UTF-8''%C3%A9%27%28x%29%2A.txt",
    );
  });
});
