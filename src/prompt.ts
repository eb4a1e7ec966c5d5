import type { Category, PetProfile } from "./types.js";

/**
 * Build the system prompt that instructs the LLM to act as a veterinary expert.
 */
export function buildSystemPrompt(): string {
  return `You are a **veterinary expert** specializing in precise, evidence-based pet care recommendations.

Your responses must be:

1. **Highly specific** — exact measurements, durations, and frequencies.
2. **Tailored** — to the exact breed, age, and health conditions given.
3. **Grounded** — in current veterinary research.
4. **Formatted** — as clear bullet points.
5. **Free of generic advice.**

Never provide general statements. Each point must include a specific metric, measurement, or actionable step.`;
}

/** Render an optional free-text field, using the literal "None" when blank. */
export function orNone(value: string): string {
  return value.trim() === "" ? "None" : value;
}

function describePet(profile: PetProfile): string {
  return `${profile.species}, ${profile.breed}`;
}

export function buildDietPrompt(profile: PetProfile): string {
  return `Generate highly specific diet recommendations for:
Species: ${profile.species}
Breed: ${profile.breed}
Age: ${profile.age} years
Weight: ${profile.weight} kg
Health Conditions: ${orNone(profile.healthConditions)}
Allergies: ${orNone(profile.allergies)}

Provide exact measurements and specific products where applicable. Format your response precisely as follows:

• Daily Caloric Requirements:
  - Exact calories: [number] kcal/day
  - Divided into [number] meals
  - Calorie distribution: [% per meal]

• Macronutrient Breakdown:
  - Protein: [exact %]
  - Fats: [exact %]
  - Carbohydrates: [exact %]

• Recommended Diet:
  - Commercial Foods:
    ∘ [specific brand and product name]
    ∘ [exact portion size in grams]
  - Fresh Foods:
    ∘ [specific ingredient]
    ∘ [exact portion in grams]

• Feeding Schedule:
  - Morning [exact time]: [exact amount in grams]
  - Evening [exact time]: [exact amount in grams]

• Required Supplements:
  - [specific supplement name]
  - [exact dosage]
  - [frequency]

• Foods to Strictly Avoid:
  - [specific food]
  - [reason for avoiding]

• Special Considerations:
  - [specific consideration based on breed/health]
  - [actionable recommendation]`;
}

export function buildCarePrompt(profile: PetProfile): string {
  return `Generate highly specific care recommendations for:
Species: ${profile.species}
Breed: ${profile.breed}
Age: ${profile.age} years
Weight: ${profile.weight} kg
Health Conditions: ${orNone(profile.healthConditions)}

Provide exact durations, frequencies, and specific products where applicable. Format your response precisely as follows:

• Exercise Requirements:
  - Daily Duration: [exact minutes]
  - Activity Breakdown:
    ∘ [specific exercise type]: [exact minutes]
    ∘ [intensity level]: [specific indicators]
  - Rest Periods: [exact duration]

• Grooming Protocol:
  - Brushing: [specific brush type], [exact frequency], [technique]
  - Bathing: [specific shampoo type], [exact frequency], [water temperature]
  - Nail Care: [specific tool], [exact frequency]

• Health Monitoring:
  - Vital Signs:
    ∘ Normal Temperature Range: [exact range]
    ∘ Normal Heart Rate: [exact range]
    ∘ Normal Respiratory Rate: [exact range]
  - Regular Checks: [specific check], [exact frequency], [warning signs]

• Behavioral Monitoring:
  - Key Indicators: [specific behavior], [normal frequency/duration], [warning signs]

• Preventive Care Schedule:
  - Vaccinations: [specific vaccine], [exact timing]
  - Parasite Prevention: [specific product], [exact dosage and frequency]

• Environment Requirements:
  - Temperature: [exact range]
  - Exercise Area: [specific dimensions]
  - Rest Area: [specific requirements]`;
}

export function buildEmergencyPrompt(profile: PetProfile): string {
  return `Provide emergency care guidelines for a ${describePet(profile)}.
Include common emergency situations and immediate actions to take before reaching the vet.

Format as bullet points:
• Signs of Emergency:
  - [sign]
• Immediate Actions:
  - [action]
• When to Contact Vet:
  - [situation]`;
}

export function buildTrainingPrompt(profile: PetProfile): string {
  return `Provide training tips for a ${describePet(profile)}, ${profile.age} years old.
Focus on essential commands and behavior training.

Format as bullet points:
• Basic Commands:
  - [command]: [how to train]
• Behavior Training:
  - [behavior]: [training method]
• Common Mistakes:
  - [mistake to avoid]`;
}

export function buildSeasonalPrompt(profile: PetProfile, month: string): string {
  return `Provide seasonal care tips for ${month} for a ${describePet(profile)}.
Include specific seasonal challenges and preparations.

Format as bullet points:
• Seasonal Risks:
  - [risk]
• Preventive Measures:
  - [measure]
• Essential Items:
  - [item]`;
}

/**
 * Build the prompt comparing a previously exported profile with the current one.
 */
export function buildComparisonPrompt(
  current: PetProfile,
  previous: PetProfile,
): string {
  return `Compare the following pet information and provide specific recommendations based on changes:

Previous Report (${previous.timestamp}):
Weight: ${previous.weight} kg
Health: ${orNone(previous.healthConditions)}

Current Information:
Weight: ${current.weight} kg
Health: ${orNone(current.healthConditions)}

Format your response as bullet points highlighting:
• Notable Changes
• Recommendations Based on Changes
• Areas to Monitor`;
}

export type PromptRequest =
  | {
      category: Exclude<Category, "seasonal" | "comparison">;
      profile: PetProfile;
    }
  | { category: "seasonal"; profile: PetProfile; month: string }
  | { category: "comparison"; profile: PetProfile; previous: PetProfile };

/**
 * Build the user prompt for any recommendation category.
 */
export function buildPrompt(request: PromptRequest): string {
  switch (request.category) {
    case "diet":
      return buildDietPrompt(request.profile);
    case "care":
      return buildCarePrompt(request.profile);
    case "emergency":
      return buildEmergencyPrompt(request.profile);
    case "training":
      return buildTrainingPrompt(request.profile);
    case "seasonal":
      return buildSeasonalPrompt(request.profile, request.month);
    case "comparison":
      return buildComparisonPrompt(request.profile, request.previous);
  }
}
