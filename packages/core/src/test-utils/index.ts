export {
  createMockGateway,
  MOCK_GATEWAY_URL,
  type MockGateway,
  type MockGatewayOptions,
  type MockRequest,
} from "./mock-gateway.js";
