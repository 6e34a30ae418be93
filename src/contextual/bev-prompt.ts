import { BusinessEnvironmentVector } from '../environment/interfaces/bev.interface';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

function formatDistance(metres: number | null): string {
  return metres === null ? 'Not found within search radius' : `${Math.round(metres)}m`;
}

function formatRating(rating: number | null): string {
  return rating === null ? 'no rated businesses' : `${rating.toFixed(2)}/5.0`;
}

/**
 * Renders a BEV as the plain-text block sent to the contextual model.
 */
export function formatBev(bev: BusinessEnvironmentVector): string {
  const { density, distance, economic } = bev;
  return [
    '[Business Environment Vector]',
    `Location: (${bev.point.lat.toFixed(6)}, ${bev.point.lon.toFixed(6)})`,
    `Analysis radius: ${bev.radiusM}m`,
    '',
    '=== Density Features ===',
    `Restaurants: ${density.restaurants}`,
    `Cafes: ${density.cafes}`,
    `Gyms: ${density.gyms}`,
    `Schools: ${density.schools}`,
    `Universities: ${density.universities}`,
    `Offices: ${density.offices}`,
    `Malls: ${density.malls}`,
    `Stores: ${density.stores}`,
    `Parks: ${density.parks}`,
    `Transit Stations: ${density.transit_stations}`,
    `Healthcare: ${density.healthcare}`,
    `Bars/Nightlife: ${density.bars}`,
    `Residential: ${density.residential}`,
    '',
    '=== Distance Features ===',
    `Distance to nearest mall: ${formatDistance(distance.mall)}`,
    `Distance to nearest cinema: ${formatDistance(distance.cinema)}`,
    `Distance to nearest university: ${formatDistance(distance.university)}`,
    `Distance to transit station: ${formatDistance(distance.transit)}`,
    `Distance to park: ${formatDistance(distance.park)}`,
    '',
    '=== Economic Indicators ===',
    `Average business rating: ${formatRating(economic.avgRating)}`,
    `Average review count: ${Math.round(economic.avgReviewCount)}`,
    `Total businesses in area: ${economic.totalBusinesses}`,
    `Premium to economy ratio: ${economic.premiumRatio.toFixed(2)}`,
    `Income proxy: ${economic.incomeLevel}`,
    `Competition density: ${economic.competitionDensity.toFixed(4)} businesses per 100m²`,
  ].join('\n');
}

export function systemPrompt(categories: readonly string[]): string {
  const names = categories.map(category => category.toUpperCase()).join(' or ');
  const fields = categories.flatMap(category => [
    `  "${category}_probability": <float between 0.0 and 1.0>,`,
    `  "${category}_reasoning": "<2-3 sentence explanation for the ${category} score>",`,
  ]);

  return [
    'You are an expert location analyst for business site selection.',
    `Evaluate the suitability of a location for opening a ${names} based on the provided Business Environment Vector (BEV).`,
    '',
    'Consider these factors:',
    '1. Customer base: office workers, students, residents',
    '2. Foot traffic: what draws people to the area',
    '3. Competition: how saturated the market is',
    '4. Income level: whether locals can afford the service',
    '5. Accessibility: how easy the location is to reach',
    '6. Synergies: nearby businesses that complement the venture',
    '',
    'Respond ONLY with valid JSON in this exact format:',
    '{',
    ...fields,
    '  "key_factors": ["factor1", "factor2", "factor3"],',
    '  "risks": ["risk1", "risk2"],',
    '  "recommendation": "<overall recommendation in 1-2 sentences>"',
    '}',
    '',
    'A probability of 0.7+ indicates strong suitability, 0.4-0.7 moderate, below 0.4 poor.',
  ].join('\n');
}

export function buildMessages(
  bev: BusinessEnvironmentVector,
  categories: readonly string[],
): ChatMessage[] {
  const tasks = categories.map((category, i) => `${i + 1}. A ${category.toUpperCase()}`);
  return [
    { role: 'system', content: systemPrompt(categories) },
    {
      role: 'user',
      content: [
        formatBev(bev),
        '',
        '[Task]',
        'Analyze this location for opening:',
        ...tasks,
        '',
        'Provide your assessment as JSON.',
      ].join('\n'),
    },
  ];
}
