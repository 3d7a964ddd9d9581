import path from 'node:path'
import { Router } from 'express'
import swaggerUi from 'swagger-ui-express'
import YAML from 'yamljs'

export const OPENAPI_DOCUMENT = 'docs/openapi.yaml'

/** <projectRoot>/docs/openapi.yaml を Swagger UI で配信する */
export const createDocsRouter = (projectRoot: string) => {
  const router = Router()
  const document = YAML.load(path.resolve(projectRoot, OPENAPI_DOCUMENT))
  router.use('/', swaggerUi.serve, swaggerUi.setup(document))
  return router
}
