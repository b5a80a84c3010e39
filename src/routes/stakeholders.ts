import { Router } from 'express';
import { DEFAULT_STAKEHOLDER, STAKEHOLDERS, STAKEHOLDER_IDS } from '../logic/stakeholders.js';

const router = Router();

router.get('/', (_req, res) => {
  res.json({ default: DEFAULT_STAKEHOLDER, stakeholders: STAKEHOLDER_IDS.map(id => STAKEHOLDERS[id]) });
});

export default router;
