import { Router } from 'express';
import { TaskController } from '../controllers/task.controller';

export function createTaskRouter(taskController: TaskController): Router {
  const router = Router();

  router.post('/', (req, res) => taskController.create(req, res));
  router.get('/', (req, res) => taskController.list(req, res));
  router.get('/:id', (req, res) => taskController.get(req, res));
  router.patch('/:id', (req, res) => taskController.update(req, res));
  router.delete('/:id', (req, res) => taskController.remove(req, res));
  router.post('/:id/enrich', (req, res) => taskController.enrich(req, res));
  router.post('/:id/retry', (req, res) => taskController.retry(req, res));
  router.get('/:id/similar', (req, res) => taskController.similar(req, res));

  return router;
}
