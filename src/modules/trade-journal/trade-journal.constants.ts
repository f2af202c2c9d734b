export const TRADE_RISK_ENGINE_TOKEN = 'ITradeRiskEngine';
