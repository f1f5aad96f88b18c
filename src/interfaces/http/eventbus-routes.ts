import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Job } from '../../domain/index.js';
import { HttpError, validateJobEvent, type JobEventRequest } from '../../application/index.js';

/**
 * Registers the EventBus routes.
 *
 * POST /eventbus/v0/internal/job/execute — run one signed job event
 * GET  /eventbus/v0/health               — configured services and job types
 */
async function eventBusRoutes(fastify: FastifyInstance): Promise<void> {

  // Other content types reach the handler, which answers 415 itself.
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  // ── POST /eventbus/v0/internal/job/execute ─────────────────────────

  fastify.post(
    '/eventbus/v0/internal/job/execute',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { config, jobs, executor } = fastify.eventBus;

      if (!config.enableRunJobApi) {
        return reply.status(501).send({
          message: 'Set enableRunJobApi to true to enable the job execution API',
        });
      }

      if (config.readOnlyReason !== null) {
        return reply.status(423).send({
          message: 'Wiki is in read-only mode',
          reason: config.readOnlyReason,
        });
      }

      let jobEvent: JobEventRequest;
      try {
        jobEvent = validateJobEvent(request.body, request.headers['content-type'], config.secretKey);
      } catch (err: unknown) {
        if (err instanceof HttpError) {
          request.log.warn({ status: err.statusCode, details: err.details }, err.message);
          return reply.status(err.statusCode).send(err.toJSON());
        }
        throw err;
      }

      let job: Job;
      try {
        job = jobs.create(jobEvent.type, jobEvent.params);
      } catch (err: unknown) {
        const error = err instanceof Error ? err.message : String(err);
        request.log.warn({ err, job_type: jobEvent.type }, 'Failed creating job from description');
        return reply.status(400).send({
          message: 'Failed creating job from description',
          error,
          type: jobEvent.type,
        });
      }

      const result = await executor.execute(job, { requestId: request.id, clientIp: request.ip });

      if (result.status) {
        return reply.status(200).send(result);
      }

      return reply.status(500).send({
        message: 'Internal Server Error',
        error: result.error,
        readonly: result.readonly,
      });
    },
  );

  // ── GET /eventbus/v0/health ────────────────────────────────────────

  fastify.get(
    '/eventbus/v0/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { buses, jobs } = fastify.eventBus;
      return reply.status(200).send({
        status: 'ok',
        event_services: buses.serviceNames,
        job_types: jobs.types,
      });
    },
  );
}

export default fp(eventBusRoutes, {
  name: 'eventbus-routes',
  dependencies: ['event-bus'],
  fastify: '5.x',
});
