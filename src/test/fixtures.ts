import type { PetProfile } from "../types.js";

export const rex: PetProfile = {
  name: "Rex",
  species: "Dog",
  breed: "Labrador",
  age: 3,
  weight: 28,
  healthConditions: "",
  favoriteFoods: "Peanut butter",
  allergies: "Chicken",
  timestamp: "2026-03-14 10:00:00",
};

export const previousRex: PetProfile = {
  ...rex,
  weight: 25,
  healthConditions: "",
  timestamp: "2026-01-05 09:30:00",
};
