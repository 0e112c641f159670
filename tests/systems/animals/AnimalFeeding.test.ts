import { describe, it, expect, beforeEach } from "vitest";
import { AnimalFeeding } from "../../../src/domain/simulation/systems/animals/AnimalFeeding";
import { AnimalRegistry } from "../../../src/domain/simulation/core/AnimalRegistry";
import { ResourcePool } from "../../../src/domain/simulation/systems/world/ResourcePool";
import { RandomUtils } from "../../../src/shared/utils/RandomUtils";
import { AnimalType } from "../../../src/shared/constants/AnimalEnums";
import { constantSource, scriptedSource } from "../../setup";

describe("AnimalFeeding", () => {
  let registry: AnimalRegistry;
  const neverRandom = new RandomUtils(constantSource(0.99));
  const alwaysRandom = new RandomUtils(constantSource(0));

  beforeEach(() => {
    registry = new AnimalRegistry();
  });

  function pool(grass: number, water: number): ResourcePool {
    return new ResourcePool({ grass, water }, neverRandom);
  }

  describe("forage", () => {
    it("feeds each herbivore its ration and credits the feeding gain", () => {
      const rabbit = registry.spawn(AnimalType.RABBIT, 1, 100);
      const deer = registry.spawn(AnimalType.DEER, 1, 100);
      const grass = pool(500, 0);

      const result = AnimalFeeding.forage(registry, grass, neverRandom);

      expect(result).toEqual({ foraged: 2, hungry: 0 });
      expect(rabbit.energy).toBe(110);
      expect(deer.energy).toBe(120);
      expect(grass.grass).toBe(470);
    });

    it("caps energy at 150", () => {
      const rabbit = registry.spawn(AnimalType.RABBIT, 1, 145);
      AnimalFeeding.forage(registry, pool(500, 0), neverRandom);
      expect(rabbit.energy).toBe(150);
    });

    it("counts a partial ration at or above the hunger threshold as a meal", () => {
      const rabbit = registry.spawn(AnimalType.RABBIT, 1, 100);
      const grass = pool(7, 0);

      const result = AnimalFeeding.forage(registry, grass, neverRandom);

      expect(result).toEqual({ foraged: 1, hungry: 0 });
      expect(rabbit.energy).toBe(110);
      expect(grass.grass).toBe(0);
    });

    it("leaves an animal hungry below the threshold but still drains the pool", () => {
      const rabbit = registry.spawn(AnimalType.RABBIT, 1, 100);
      const grass = pool(4, 0);

      const result = AnimalFeeding.forage(registry, grass, neverRandom);

      expect(result).toEqual({ foraged: 0, hungry: 1 });
      expect(rabbit.energy).toBe(100);
      expect(grass.grass).toBe(0);
    });

    it("serves herbivores in shuffled order", () => {
      const rabbit = registry.spawn(AnimalType.RABBIT, 1, 100);
      const deer = registry.spawn(AnimalType.DEER, 1, 100);

      // draw 0 swaps the two, so the deer eats first
      AnimalFeeding.forage(registry, pool(24, 0), alwaysRandom);

      expect(deer.energy).toBe(120);
      expect(rabbit.energy).toBe(100);
    });

    it("ignores predators", () => {
      const fox = registry.spawn(AnimalType.FOX, 1, 100);
      const grass = pool(100, 0);

      expect(AnimalFeeding.forage(registry, grass, neverRandom)).toEqual({
        foraged: 0,
        hungry: 0,
      });
      expect(fox.energy).toBe(100);
      expect(grass.grass).toBe(100);
    });
  });

  describe("hunt", () => {
    it("removes the prey and feeds the predator on a successful draw", () => {
      const fox = registry.spawn(AnimalType.FOX, 1, 100);
      const rabbit = registry.spawn(AnimalType.RABBIT, 1, 100);

      const kills = AnimalFeeding.hunt(registry, alwaysRandom);

      expect(kills).toEqual([
        {
          hunterId: fox.id,
          hunterType: AnimalType.FOX,
          preyId: rabbit.id,
          preyType: AnimalType.RABBIT,
        },
      ]);
      expect(registry.hasAnimal(rabbit.id)).toBe(false);
      expect(fox.energy).toBe(140);
    });

    it("changes nothing on a failed draw", () => {
      const fox = registry.spawn(AnimalType.FOX, 1, 100);
      registry.spawn(AnimalType.RABBIT, 1, 100);

      expect(AnimalFeeding.hunt(registry, neverRandom)).toEqual([]);
      expect(registry.size).toBe(2);
      expect(fox.energy).toBe(100);
    });

    it("skips the draw when the preferred prey is absent", () => {
      const wolf = registry.spawn(AnimalType.WOLF, 1, 100);
      registry.spawn(AnimalType.RABBIT, 1, 100);
      const source = scriptedSource([0]);

      expect(AnimalFeeding.hunt(registry, new RandomUtils(source))).toEqual([]);
      expect(source.consumed()).toBe(0);
      expect(wolf.energy).toBe(100);
      expect(registry.size).toBe(2);
    });

    it("does not let two predators share one prey", () => {
      const firstFox = registry.spawn(AnimalType.FOX, 1, 100);
      const secondFox = registry.spawn(AnimalType.FOX, 1, 100);
      registry.spawn(AnimalType.RABBIT, 1, 100);

      const kills = AnimalFeeding.hunt(registry, alwaysRandom);

      // draw 0 swaps the foxes, so the second one hunts first
      expect(kills).toHaveLength(1);
      expect(kills[0].hunterId).toBe(secondFox.id);
      expect(secondFox.energy).toBe(140);
      expect(firstFox.energy).toBe(100);
      expect(registry.countByType()[AnimalType.RABBIT]).toBe(0);
    });

    it("caps predator energy at 150", () => {
      const wolf = registry.spawn(AnimalType.WOLF, 1, 130);
      registry.spawn(AnimalType.DEER, 1, 100);

      AnimalFeeding.hunt(registry, alwaysRandom);

      expect(wolf.energy).toBe(150);
    });
  });

  describe("drink", () => {
    it("gives a ration of 2 to each animal until the water runs out", () => {
      registry.spawn(AnimalType.RABBIT, 1, 100);
      registry.spawn(AnimalType.DEER, 1, 100);
      registry.spawn(AnimalType.FOX, 1, 100);
      const water = pool(0, 5);

      expect(AnimalFeeding.drink(registry, water, 0)).toBe(2);
      expect(water.water).toBe(0);
    });

    it("is energy-neutral with a zero drinking gain", () => {
      const rabbit = registry.spawn(AnimalType.RABBIT, 1, 100);
      AnimalFeeding.drink(registry, pool(0, 100), 0);
      expect(rabbit.energy).toBe(100);
    });

    it("grants the drinking gain only for a full ration", () => {
      const rabbit = registry.spawn(AnimalType.RABBIT, 1, 100);
      const deer = registry.spawn(AnimalType.DEER, 1, 100);

      AnimalFeeding.drink(registry, pool(0, 3), 5);

      expect(rabbit.energy).toBe(105);
      expect(deer.energy).toBe(100);
    });
  });
});
