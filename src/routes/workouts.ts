import { Router } from 'express';

import { summarizeRequest } from '../controllers/summaries';

const router = Router();

router.post('/summary', summarizeRequest);

export default router;
