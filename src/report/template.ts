export const REPORT_TEMPLATE = `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>Oracle CIS Audit Report</title>
  <style>
    body { font-family: Arial, sans-serif; padding: 20px; }
    table { width: 100%; border-collapse: collapse; margin-top: 20px; }
    th, td { padding: 10px; border: 1px solid #ccc; text-align: left; vertical-align: top; }
    th { background-color: #f0f0f0; }
    .High { background-color: #f8d7da; }
    .Medium { background-color: #fff3cd; }
    .Low { background-color: #d4edda; }
    pre { white-space: pre-wrap; background: #f4f4f4; padding: 8px; }
  </style>
</head>
<body>
  <h1>Oracle Database CIS Audit Report</h1>
  <p><strong>Date:</strong> <span id="generated"></span></p>
  <table>
    <thead>
      <tr>
        <th>Finding ID</th>
        <th>Description</th>
        <th>Risk Rating</th>
        <th>Fix Type</th>
        <th>Remediation</th>
        <th>Output</th>
      </tr>
    </thead>
    <tbody><tr><td></td><td></td><td></td><td></td><td></td><td><pre></pre></td></tr></tbody>
  </table>
</body>
</html>
`;
