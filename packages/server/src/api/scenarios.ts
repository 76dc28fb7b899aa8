/**
 * Scenario Control Endpoints
 *
 * REST endpoints for listing, enabling and disabling failure scenarios.
 * @module @fault-proxy/server/api/scenarios
 */

import { Router, type Request, type Response } from 'express';
import {
  NotFoundError,
  createServiceLogger,
  generateCorrelationId,
  validateScenarioOverrides,
} from '@fault-proxy/shared';
import type { ScenarioRegistry } from '../faults/scenario-registry.js';
import { serializeScenarioConfig } from './serializers.js';
import { sendError } from './responses.js';

const logger = createServiceLogger(
  { service: 'fault-proxy' },
  { component: 'api-scenarios' },
);

type ScenarioRequest = Request<{ name: string }>;

export interface ScenarioHandlers {
  listScenarios(req: Request, res: Response): void;
  enableScenario(req: ScenarioRequest, res: Response): void;
  disableScenario(req: ScenarioRequest, res: Response): void;
  getScenarioStatus(req: ScenarioRequest, res: Response): void;
  disableAllScenarios(req: Request, res: Response): void;
}

export function createScenarioHandlers(registry: ScenarioRegistry): ScenarioHandlers {
  return {
    /**
     * GET /scenarios
     */
    listScenarios(_req, res) {
      res.status(200).json({ scenarios: registry.list() });
    },

    /**
     * POST /scenarios/:name/enable - optional body `{ duration_seconds }`
     */
    enableScenario(req, res) {
      const name = req.params.name;
      const requestLogger = logger.withCorrelationId(generateCorrelationId());

      try {
        // Unknown names are reported before the body is looked at
        if (!registry.has(name)) {
          throw NotFoundError.scenario(name);
        }

        const overrides = validateScenarioOverrides(req.body);
        if (!overrides.valid) {
          throw overrides.error;
        }

        const config = registry.enable(name, overrides.value);
        requestLogger.info('Scenario enabled via API', { scenario: name });
        res.status(200).json({
          scenario: name,
          enabled: true,
          config: serializeScenarioConfig(config),
        });
      } catch (error) {
        sendError(res, error, requestLogger);
      }
    },

    /**
     * POST /scenarios/:name/disable
     */
    disableScenario(req, res) {
      const name = req.params.name;
      try {
        registry.disable(name);
        res.status(200).json({ scenario: name, enabled: false });
      } catch (error) {
        sendError(res, error, logger);
      }
    },

    /**
     * GET /scenarios/:name/status
     */
    getScenarioStatus(req, res) {
      try {
        const status = registry.status(req.params.name);
        res.status(200).json({
          name: status.name,
          description: status.description,
          enabled: status.enabled,
          config: status.config ? serializeScenarioConfig(status.config) : null,
        });
      } catch (error) {
        sendError(res, error, logger);
      }
    },

    /**
     * POST /scenarios/disable-all
     */
    disableAllScenarios(_req, res) {
      registry.disableAll();
      res.status(200).json({ message: 'All scenarios disabled' });
    },
  };
}

export function createScenariosRouter(registry: ScenarioRegistry): Router {
  const router = Router();
  const handlers = createScenarioHandlers(registry);

  router.get('/', handlers.listScenarios);
  router.post('/disable-all', handlers.disableAllScenarios);
  router.post('/:name/enable', handlers.enableScenario);
  router.post('/:name/disable', handlers.disableScenario);
  router.get('/:name/status', handlers.getScenarioStatus);

  return router;
}
