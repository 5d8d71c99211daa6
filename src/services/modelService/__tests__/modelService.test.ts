import axios, { AxiosError, AxiosRequestConfig } from 'axios'
import MockAdapter from 'axios-mock-adapter'
import { TEST_ENDPOINT, testConfig } from '../../../__tests__/helpers/fixtures'
import { MatcherConfig } from '../../../model/config'
import { LogService } from '../../logService'
import { chatCallOptions, matchingCallOptions } from '../helpers'
import { ModelService } from '../modelService'
import { GenerateRequest } from '../types'

jest.mock('../../../logger', () => {
    const logger = {
        level: 'info',
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    }
    logger.child.mockReturnValue(logger)
    return { logger }
})

const requestOf = (config: AxiosRequestConfig): GenerateRequest => JSON.parse(String(config.data))

const connectionRefused = () => Promise.reject(new AxiosError('connect ECONNREFUSED 127.0.0.1:11434', 'ECONNREFUSED'))

describe('ModelService', () => {
    let mockAxios: MockAdapter
    let config: MatcherConfig
    let service: ModelService

    const attemptedModels = () => mockAxios.history.post.map((request) => requestOf(request).model)

    beforeEach(() => {
        config = testConfig()
        const http = axios.create()
        mockAxios = new MockAdapter(http)
        service = new ModelService(config, new LogService(config), http)
    })

    afterEach(() => {
        mockAxios.restore()
        jest.clearAllMocks()
    })

    it('should return the response text of the first model on success', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply(200, { response: 'Score: 81', done: true })

        const result = await service.call('prompt', ['M1', 'M2', 'M3'], matchingCallOptions(config))

        expect(result).toEqual({ status: 'ok', text: 'Score: 81', model: 'M1', fallbacks: 0 })
        expect(attemptedModels()).toEqual(['M1'])
    })

    it('should post the generate payload with the call timeout', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply(200, { response: 'ok' })

        await service.generate('Hello there', ['M1'], matchingCallOptions(config))

        const [request] = mockAxios.history.post
        expect(requestOf(request)).toEqual({
            model: 'M1',
            prompt: 'Hello there',
            stream: false,
            options: { temperature: 0.7, num_predict: 2000 },
        })
        expect(request.timeout).toBe(60000)
    })

    it('should include the api key when one is configured', async () => {
        const keyed = testConfig({ apiKey: 'test-secret' })
        const http = axios.create()
        const keyedAxios = new MockAdapter(http)
        keyedAxios.onPost(TEST_ENDPOINT).reply(200, { response: 'ok' })

        await new ModelService(keyed, new LogService(keyed), http).generate('p', ['M1'], chatCallOptions(keyed))

        const [request] = keyedAxios.history.post
        expect(requestOf(request).api_key).toBe('test-secret')
        expect(requestOf(request).options).toEqual({ temperature: 0.7, num_predict: 500 })
        expect(request.timeout).toBe(120000)
    })

    it('should fall back along the chain on transport errors and stop at the first answer', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply((request) =>
            requestOf(request).model === 'M3' ? [200, { response: 'From M3: score 64' }] : connectionRefused()
        )

        const result = await service.call('prompt', ['M1', 'M2', 'M3'], matchingCallOptions(config))

        expect(result).toEqual({ status: 'ok', text: 'From M3: score 64', model: 'M3', fallbacks: 2 })
        expect(attemptedModels()).toEqual(['M1', 'M2', 'M3'])
    })

    it('should never try a model beyond the chain', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply(() => connectionRefused())

        const result = await service.call('prompt', ['M1', 'M2', 'M3'], matchingCallOptions(config))

        expect(result).toEqual({ status: 'unavailable', attempted: ['M1', 'M2', 'M3'] })
        expect(attemptedModels()).toEqual(['M1', 'M2', 'M3'])
        await expect(service.generate('prompt', ['M1'], matchingCallOptions(config))).resolves.toBeUndefined()
    })

    it('should try at most three models however long the chain', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply(() => connectionRefused())

        const result = await service.call('prompt', ['M1', 'M2', 'M3', 'M4', 'M5'], matchingCallOptions(config))

        expect(result).toEqual({ status: 'unavailable', attempted: ['M1', 'M2', 'M3'] })
        expect(attemptedModels()).toEqual(['M1', 'M2', 'M3'])
    })

    it('should fall back when a 200 reply is not a JSON object', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply((request) =>
            requestOf(request).model === 'M1' ? [200, '<html>proxy error</html>'] : [200, { response: 'score: 77' }]
        )

        const result = await service.call('prompt', ['M1', 'M2', 'M3'], matchingCallOptions(config))

        expect(result).toEqual({ status: 'ok', text: 'score: 77', model: 'M2', fallbacks: 1 })
        expect(attemptedModels()).toEqual(['M1', 'M2'])
    })

    it('should report the chain as unavailable when no reply has a JSON body', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply(200, ['not', 'an', 'object'])

        await expect(service.call('prompt', ['M1', 'M2'], matchingCallOptions(config))).resolves.toEqual({
            status: 'unavailable',
            attempted: ['M1', 'M2'],
        })
    })

    it('should not fall back on a non-200 response', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply(500, { error: 'model not loaded' })

        const result = await service.call('prompt', ['M1', 'M2'], matchingCallOptions(config))

        expect(result).toEqual({ status: 'http-error', httpStatus: 500, model: 'M1', fallbacks: 0 })
        expect(attemptedModels()).toEqual(['M1'])
        await expect(service.generate('prompt', ['M1', 'M2'], matchingCallOptions(config))).resolves.toBeUndefined()
    })

    it('should treat a timeout as a transport error', async () => {
        mockAxios
            .onPost(TEST_ENDPOINT)
            .reply((request) =>
                requestOf(request).model === 'M1'
                    ? Promise.reject(new AxiosError('timeout of 60000ms exceeded', 'ECONNABORTED'))
                    : [200, { response: 'late but fine' }]
            )

        await expect(service.generate('prompt', ['M1', 'M2'], matchingCallOptions(config))).resolves.toBe(
            'late but fine'
        )
        expect(attemptedModels()).toEqual(['M1', 'M2'])
    })

    it('should return empty text when the body has no response field', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply(200, { done: true })

        await expect(service.generate('prompt', ['M1'], matchingCallOptions(config))).resolves.toBe('')
    })

    it('should keep no model state between calls', async () => {
        mockAxios.onPost(TEST_ENDPOINT).reply((request) =>
            requestOf(request).model === 'M1' && mockAxios.history.post.length === 1
                ? connectionRefused()
                : [200, { response: 'ok' }]
        )

        await service.call('first', ['M1', 'M2'], matchingCallOptions(config))
        const second = await service.call('second', ['M1', 'M2'], matchingCallOptions(config))

        expect(second).toEqual({ status: 'ok', text: 'ok', model: 'M1', fallbacks: 0 })
        expect(attemptedModels()).toEqual(['M1', 'M2', 'M1'])
    })

    it('should report an empty chain as unavailable', async () => {
        await expect(service.call('prompt', [], matchingCallOptions(config))).resolves.toEqual({
            status: 'unavailable',
            attempted: [],
        })
        expect(mockAxios.history.post).toHaveLength(0)
    })
})
