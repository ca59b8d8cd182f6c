/**
 * Test Fixtures
 * Reusable site bodies
 */

export const linkedHomePage = `
<!DOCTYPE html>
<html>
<head>
  <title>Home</title>
  <link rel="stylesheet" href="/css/site.css">
  <script src="/static/app.js"></script>
</head>
<body>
  <a href="/about">About</a>
  <a href="/login.php">Log in</a>
  <a href="https://partner.example.org/offer">Partner</a>
  <a href="mailto:team@example.com">Mail us</a>
  <img src="/img/logo.png" alt="logo">
  <form action="/search.php" method="get"><input name="q"></form>
  <script>
    function toggleMenu() {}
    fetch('/api/session');
  </script>
</body>
</html>
`;

export const appScript = `
function validateForm() {
  return true;
}
var initCart = function () {};
const loadItems = async () => {
  const res = await fetch('/api/items');
  return res.json();
};
`;
