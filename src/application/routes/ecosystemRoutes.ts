import { Router } from 'express';
import { ecosystemController } from '@/infrastructure/controllers/ecosystemController';

const router = Router();

router.get('/api/ecosystem', ecosystemController.getState);
router.post('/api/ecosystem/advance', ecosystemController.advance);
router.post('/api/ecosystem/grass', ecosystemController.addGrass);
router.post('/api/ecosystem/water', ecosystemController.addWater);
router.post('/api/ecosystem/animals', ecosystemController.introduceAnimals);

export default router;
