import { Router } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { deriveMetrics } from '../logic/derive.js';
import { collectSnapshot } from '../logic/snapshot.js';
import { DEFAULT_STAKEHOLDER, STAKEHOLDER_IDS } from '../logic/stakeholders.js';
import type { EnvironmentClients } from '../types.js';
import { computeAdvisories, healthRecommendations } from '../utils/alerts.js';

export interface DashboardDeps {
  config: AppConfig;
  clients: EnvironmentClients;
  logger: Logger;
}

// ====== Body validation ======
function bodySchema(defaults: AppConfig['defaults']) {
  return z.object({
    lat: z.number().min(-90).max(90).default(defaults.lat),
    lon: z.number().min(-180).max(180).default(defaults.lon),
    timezone: z.string().min(1).default(defaults.timezone),
    forecastDays: z.number().int().min(1).max(16).default(defaults.forecastDays),
    stakeholder: z.enum(STAKEHOLDER_IDS).default(DEFAULT_STAKEHOLDER),
    turbidity: z.number().min(0).max(1).optional(),
  });
}

export default function dashboardRouter({ config, clients, logger }: DashboardDeps) {
  const router = Router();
  const Body = bodySchema(config.defaults);

  // ====== Main handler ======
  router.post('/', async (req, res, next) => {
    try {
      const parsed = Body.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: 'Bad Request', details: parsed.error.format() });
      }
      const { lat, lon, timezone, forecastDays, stakeholder, turbidity } = parsed.data;

      const snapshot = await collectSnapshot(clients, { lat, lon, timezone, forecastDays }, logger);
      const derived = deriveMetrics(snapshot, { turbidityProxy: turbidity });
      const advisories = computeAdvisories({
        weather: snapshot.weather,
        airQuality: snapshot.airQuality,
        derived,
        stakeholder,
        timezone,
      });

      const isDefault = lat === config.defaults.lat && lon === config.defaults.lon;
      res.json({
        location: { lat, lon, name: isDefault ? 'Bengaluru' : null, timezone },
        stakeholder,
        weather: snapshot.weather ?? null,
        airQuality: snapshot.airQuality ?? null,
        earthObservation: snapshot.earthObservation ?? null,
        derived,
        advisories,
        recommendations: healthRecommendations(snapshot.weather, snapshot.airQuality),
        failures: snapshot.failures,
        meta: {
          generatedAt: new Date().toISOString(),
          sources: {
            weather: 'open-meteo',
            airQuality: 'open-meteo:air-quality',
            earthObservation: 'nasa:earth-assets+power',
          },
        },
      });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
