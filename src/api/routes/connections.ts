import { Router, Request, Response, NextFunction } from 'express';
import { AxiosInstance } from 'axios';
import {
  JiraConnection,
  JiraCredentials,
  createJiraApi,
  fetchRecentJiraIssues,
  verifyJiraConnection,
} from '../../integrations/jira-client';
import { verifyAzureProject } from '../../integrations/azure-devops-client';
import { validateAzureConnectionRequest, validateJiraConnectionRequest, JiraConnectionBody } from '../middleware/request-validator';
import { ApiError } from '../middleware/error-handler';
import logger from '../../utils/logger';

export interface ConnectionDeps {
  connectJira?: (credentials: JiraCredentials) => JiraConnection;
  azureHttp?: AxiosInstance;
}

function jiraCredentialsOf(body: JiraConnectionBody): JiraCredentials {
  return { baseUrl: body.jira_url, email: body.jira_user, apiToken: body.jira_token };
}

/**
 * Credential checks and issue suggestions for the source pickers. The
 * credentials come with each request and are never stored.
 */
export function createConnectionsRoute(deps: ConnectionDeps = {}): Router {
  const router = Router();
  const connectJira: (credentials: JiraCredentials) => JiraConnection = deps.connectJira ?? createJiraApi;

  router.post('/verify-jira', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateJiraConnectionRequest(req.body);
      const user = await verifyJiraConnection(connectJira(jiraCredentialsOf(body)));

      res.json({ success: true, message: 'Connection successful', user });
    } catch (error) {
      next(error);
    }
  });

  router.post('/verify-azure', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateAzureConnectionRequest(req.body);
      const project = await verifyAzureProject(
        {
          baseUrl: body.azure_url,
          organization: body.azure_org,
          project: body.azure_project,
          pat: body.azure_pat,
        },
        deps.azureHttp
      );

      res.json({ success: true, message: 'Connection successful', project });
    } catch (error) {
      next(error);
    }
  });

  router.post('/fetch-jira-items', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateJiraConnectionRequest(req.body);
      const items = await fetchRecentJiraIssues(connectJira(jiraCredentialsOf(body)));

      if (items.length === 0) {
        throw new ApiError('No issues found', 404);
      }

      logger.info('Jira issue suggestions listed', { item_count: items.length });
      res.json({ success: true, items });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
