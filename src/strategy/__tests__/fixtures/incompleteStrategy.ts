export default {
    name: 'incomplete',
    markets: 'market-1',
    onStart(): void {},
};
