import type { CommandDefinition } from "./types";

export const searchCommand: CommandDefinition = {
  name: "search",
  description: "Search the active (or named) provider",
  run: async (args, { runtime }) => {
    const result = await runtime.search(
      { keyword: args.keyword ?? "", page: args.page },
      { providerId: args.provider }
    );
    return {
      success: true,
      message: `${result.items.length} result(s) on page ${result.page}`,
      data: result
    };
  }
};

export const categoriesCommand: CommandDefinition = {
  name: "categories",
  description: "List categories offered by a provider",
  run: async (args, { runtime }) => {
    const categories = await runtime.getCategories({ providerId: args.provider });
    return {
      success: true,
      message: `${categories.length} categories`,
      data: categories
    };
  }
};

export const providersCommand: CommandDefinition = {
  name: "providers",
  description: "List registered providers and their capabilities",
  run: async (_args, { runtime }) => {
    const listing = runtime.listProviders();
    return {
      success: true,
      message: `${listing.providers.length} provider(s), active: ${listing.active ?? "none"}`,
      data: listing
    };
  }
};
