import type { IGameModule, Variant } from "@tictacfoe/core";
import { TicTacToeModule } from "@tictacfoe/game-tictactoe";
import { UltimateModule } from "@tictacfoe/game-ultimate";

/**
 * In-memory registry of available variant modules.
 */
export class GameRegistry {
  private games = new Map<Variant, IGameModule>();

  register(game: IGameModule): void {
    this.games.set(game.variant, game);
  }

  get(variant: Variant): IGameModule {
    const game = this.games.get(variant);
    if (!game) {
      throw new Error(`No module registered for variant "${variant}"`);
    }
    return game;
  }

  list(): IGameModule[] {
    return Array.from(this.games.values());
  }

  has(variant: Variant): boolean {
    return this.games.has(variant);
  }
}

export function createDefaultRegistry(): GameRegistry {
  const registry = new GameRegistry();
  registry.register(TicTacToeModule);
  registry.register(UltimateModule);
  return registry;
}

export const defaultRegistry = createDefaultRegistry();
