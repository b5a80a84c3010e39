export const STAKEHOLDER_IDS = ['citizens', 'city-planning', 'water-board', 'electricity', 'parks', 'researchers'] as const;

export type StakeholderId = typeof STAKEHOLDER_IDS[number];

export interface Stakeholder {
  id: StakeholderId;
  label: string;
  focus: string;
}

export const STAKEHOLDERS: Record<StakeholderId, Stakeholder> = {
  'citizens': {
    id: 'citizens',
    label: 'Citizens',
    focus: 'daily-life weather, air quality and health advice',
  },
  'city-planning': {
    id: 'city-planning',
    label: 'City Planning',
    focus: 'urban heat islands, green cover and development pressure',
  },
  'water-board': {
    id: 'water-board',
    label: 'Water Board',
    focus: 'lake health, rainfall and water resource management',
  },
  'electricity': {
    id: 'electricity',
    label: 'Electricity',
    focus: 'temperature-driven power demand and grid stress',
  },
  'parks': {
    id: 'parks',
    label: 'Parks Department',
    focus: 'green spaces, tree health and urban cooling',
  },
  'researchers': {
    id: 'researchers',
    label: 'Researchers',
    focus: 'data quality, correlations between climate variables and trends',
  },
};

export const DEFAULT_STAKEHOLDER: StakeholderId = 'citizens';
